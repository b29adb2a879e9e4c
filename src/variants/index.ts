export * from './types.js';
export * from './errors.js';
export { classify, classifyModel, classifyText, labelForMarker } from './classifier.js';
export { normalizeKey, resolveKey, randomIdGenerator } from './keyNormalizer.js';
export { isMergeEligible, isMergeLabel, groupKeyOf } from './eligibility.js';
export { variantOrder, compareVariantLabels, sortVariants } from './ordering.js';
export { mergeVariants, mergeVariantsWithReport, classifySeed, toStandaloneEntry } from './merger.js';
export type { MergeOptions, MergeReport, MergeResult, SeedClassification } from './merger.js';
export { preferredVariant, selectVariant } from './selection.js';
export { normalizeBaseModel, baseModelFolderName } from './baseModel.js';
export { parseManifest, parseModelRecord, ModelRecordSchema, SeedSchema, ManifestSchema } from './schema.js';
export { buildMergeMetrics, formatMetricsLog } from './metrics.js';
export type { MergeMetrics } from './metrics.js';
