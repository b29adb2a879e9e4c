#!/usr/bin/env node
import fs from 'fs';
import { cfg } from './config.js';
import { mergeVariantsWithReport } from './variants/merger.js';
import { buildMergeMetrics, formatMetricsLog } from './variants/metrics.js';
import { parseManifest } from './variants/schema.js';

const USAGE = 'Usage: lora-variants <manifest.json> [--metrics]';

/**
 * Read a seed manifest, merge High/Low variants and print the cards as JSON.
 * Returns the process exit code.
 */
export function run(args: string[]): number {
  const flags = new Set(args.filter(a => a.startsWith('--')));
  const [manifestPath] = args.filter(a => !a.startsWith('--'));

  if (flags.has('--help')) {
    console.log(USAGE);
    return 0;
  }
  if (!manifestPath) {
    console.error(USAGE);
    return 1;
  }

  const raw = fs.readFileSync(manifestPath, 'utf8');
  const seeds = parseManifest(JSON.parse(raw));

  const started = Date.now();
  const { entries, report } = mergeVariantsWithReport(seeds);
  const durationMs = Date.now() - started;

  console.log(JSON.stringify(entries, null, cfg.jsonIndent || undefined));

  if (cfg.metrics || flags.has('--metrics')) {
    const metrics = buildMergeMetrics({ entries, report, durationMs });
    console.log(`[cli] ${formatMetricsLog(metrics)} durationMs=${durationMs}`);
  }
  return 0;
}

export function main(args: string[] = process.argv.slice(2)) {
  try {
    process.exitCode = run(args);
  } catch (e) {
    console.error('[cli] failed:', e instanceof Error ? e.message : e);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main();
}
