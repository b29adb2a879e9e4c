// Stable group-by over discovered seeds.
// Eligible High/Low seeds sharing a group key collapse into one card placed
// where the first of them appeared; everything else stays a standalone card.

import { classifyModel } from './classifier.js';
import { cfg } from './config.js';
import { groupKeyOf, isMergeEligible } from './eligibility.js';
import { MergePreconditionError } from './errors.js';
import { randomIdGenerator, resolveKey } from './keyNormalizer.js';
import { sortVariants } from './ordering.js';
import type { CardEntry, Classification, IdGenerator, KeySource, Seed, VariantDescriptor } from './types.js';
import { isBlank } from '../utils/text.js';

export interface MergeOptions {
  generateId?: IdGenerator;
  debug?: boolean;
}

export interface MergeReport {
  seeds: number;
  cards: number;
  groups: number;
  groupedSeeds: number;
  standalone: number;
  overwrittenVariants: number;
  generatedKeys: number;
}

export interface MergeResult {
  entries: CardEntry[];
  report: MergeReport;
}

export interface SeedClassification {
  classification: Classification;
  keySource: KeySource;
}

interface VariantGroup {
  seed: Seed;
  normalizedKey: string;
  // lowercased label -> descriptor; last write wins
  variants: Map<string, VariantDescriptor>;
}

type Marker =
  | { kind: 'standalone'; entry: CardEntry }
  | { kind: 'group'; handle: number };

/**
 * Classify a seed's model with a guaranteed non-empty key.
 * The label comes from the classifier; the key from the normalizer's fallback chain.
 */
export function classifySeed(seed: Seed, generateId: IdGenerator = randomIdGenerator): SeedClassification {
  const { variantLabel } = classifyModel(seed.model);
  const { key, source } = resolveKey(seed.model, generateId);
  return { classification: { normalizedKey: key, variantLabel }, keySource: source };
}

export function mergeVariants(seeds: Iterable<Seed>, options: MergeOptions = {}): CardEntry[] {
  return mergeVariantsWithReport(seeds, options).entries;
}

export function mergeVariantsWithReport(seeds: Iterable<Seed>, options: MergeOptions = {}): MergeResult {
  if (seeds == null) throw new MergePreconditionError();

  const generateId = options.generateId ?? randomIdGenerator;
  const debug = options.debug ?? cfg.debug;

  const markers: Marker[] = [];
  const groups: VariantGroup[] = [];
  const handles = new Map<string, number>();
  const report: MergeReport = {
    seeds: 0,
    cards: 0,
    groups: 0,
    groupedSeeds: 0,
    standalone: 0,
    overwrittenVariants: 0,
    generatedKeys: 0,
  };

  for (const seed of seeds) {
    report.seeds++;
    const { classification, keySource } = classifySeed(seed, generateId);
    if (keySource === 'generated') report.generatedKeys++;

    // Keys from the sanitized or generated fallbacks identify nothing; never group on them
    if (keySource !== 'model' || !isMergeEligible(seed.model, classification)) {
      markers.push({ kind: 'standalone', entry: toStandaloneEntry(seed, classification) });
      report.standalone++;
      continue;
    }

    const groupKey = groupKeyOf(seed.model, classification);
    let handle = handles.get(groupKey);
    if (handle === undefined) {
      handle = groups.length;
      groups.push({ seed, normalizedKey: classification.normalizedKey, variants: new Map() });
      handles.set(groupKey, handle);
      markers.push({ kind: 'group', handle });
      if (debug) {
        console.log('[mergeVariants] GROUP', { handle, normalizedKey: classification.normalizedKey, modelId: seed.model.modelId });
      }
    }

    const group = groups[handle];
    const labelKey = classification.variantLabel.toLowerCase();
    const existing = group.variants.get(labelKey);
    if (existing) {
      report.overwrittenVariants++;
      if (debug) {
        console.warn('[mergeVariants] OVERWRITE', {
          handle,
          label: existing.label,
          previous: existing.model.safeTensorFileName,
          next: seed.model.safeTensorFileName,
        });
      }
    }
    // Keep the label text first seen for this slot; the model is replaced.
    group.variants.set(labelKey, { label: existing?.label ?? classification.variantLabel, model: seed.model });
    report.groupedSeeds++;
  }

  const entries = markers.map(marker =>
    marker.kind === 'standalone' ? marker.entry : toGroupEntry(groups[marker.handle])
  );

  report.groups = groups.length;
  report.cards = entries.length;
  return { entries, report };
}

export function toStandaloneEntry(seed: Seed, classification: Classification): CardEntry {
  const variants: VariantDescriptor[] = isBlank(classification.variantLabel)
    ? []
    : [{ label: classification.variantLabel, model: seed.model }];

  return {
    model: seed.model,
    normalizedKey: classification.normalizedKey,
    sourcePath: seed.sourcePath,
    folderPath: seed.folderPath,
    treePath: seed.treePath,
    treeSegments: seed.treeSegments,
    variants,
  };
}

function toGroupEntry(group: VariantGroup): CardEntry {
  const ordered = sortVariants([...group.variants.values()]);
  const { seed } = group;

  return {
    model: ordered[0].model,
    normalizedKey: group.normalizedKey,
    sourcePath: seed.sourcePath,
    folderPath: seed.folderPath,
    treePath: seed.treePath,
    treeSegments: seed.treeSegments,
    variants: ordered,
  };
}
