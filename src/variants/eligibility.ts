import { HIGH, LOW } from './types.js';
import type { Classification, ModelRecord } from './types.js';
import { equalsIgnoreCase, isBlank } from '../utils/text.js';

export function isMergeLabel(label?: string | null): boolean {
  return equalsIgnoreCase(label, HIGH) || equalsIgnoreCase(label, LOW);
}

/**
 * Grouping claims two files are the same model, so it needs three agreeing
 * identity signals: a normalized key, a declared model id and a base model.
 * Models without a High/Low label always render standalone.
 */
export function isMergeEligible(model: ModelRecord, classification: Classification): boolean {
  return (
    isMergeLabel(classification.variantLabel) &&
    !isBlank(classification.normalizedKey) &&
    !isBlank(model.modelId) &&
    !isBlank(model.diffusionBaseModel)
  );
}

/**
 * Composite key for "same logical model". Only built for eligible models, so
 * every part is non-empty; parts are compared case-insensitively.
 */
export function groupKeyOf(model: ModelRecord, classification: Classification): string {
  return [classification.normalizedKey, model.modelId, model.diffusionBaseModel]
    .map(part => part.toLowerCase())
    .join('\u0000');
}
