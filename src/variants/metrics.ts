// Metrics and audit trail for merge runs

import { baseModelFolderName } from './baseModel.js';
import { ENGINE_VERSION } from './config.js';
import type { MergeReport } from './merger.js';
import type { CardEntry } from './types.js';

export const UNKNOWN_BASE_MODEL = '(unknown)';

export interface MergeMetrics {
  engineVersion: string;
  totals: MergeReport;
  byBaseModel: Record<string, {
    cards: number;
    multiVariant: number;
  }>;
  timestamp: string;
  durationMs: number;
}

export function buildMergeMetrics(opts: {
  entries: CardEntry[];
  report: MergeReport;
  durationMs: number;
}): MergeMetrics {
  const { entries, report, durationMs } = opts;

  const byBaseModel: MergeMetrics['byBaseModel'] = {};
  for (const entry of entries) {
    const base = baseModelFolderName(entry.model.diffusionBaseModel) ?? UNKNOWN_BASE_MODEL;
    if (!byBaseModel[base]) {
      byBaseModel[base] = { cards: 0, multiVariant: 0 };
    }
    byBaseModel[base].cards++;
    if (entry.variants.length > 1) byBaseModel[base].multiVariant++;
  }

  return {
    engineVersion: ENGINE_VERSION,
    totals: { ...report },
    byBaseModel,
    timestamp: new Date().toISOString(),
    durationMs,
  };
}

export function formatMetricsLog(m: MergeMetrics): string {
  const t = m.totals;
  return `METRICS seeds=${t.seeds} cards=${t.cards} groups=${t.groups} groupedSeeds=${t.groupedSeeds} standalone=${t.standalone} overwritten=${t.overwrittenVariants} generatedKeys=${t.generatedKeys}`;
}
