import { randomBytes } from 'node:crypto';
import { classifyModel, classifyText } from './classifier.js';
import type { IdGenerator, ModelRecord, ResolvedKey } from './types.js';
import { alnumKey, isBlank } from '../utils/text.js';

/** 128 random bits as 32 hex chars. */
export const randomIdGenerator: IdGenerator = () => randomBytes(16).toString('hex');

/**
 * Derive the grouping key for a model, walking the fallback chain:
 *   1. classifier key for the whole record
 *   2. classifier key for the safetensor filename alone
 *   3. classifier key for the version name alone
 *   4. filename (or version name) reduced to lowercase letters/digits
 *   5. a generated unique token
 * Never returns an empty key. Two models that reach step 5 never share one.
 */
export function resolveKey(model: ModelRecord, generateId: IdGenerator = randomIdGenerator): ResolvedKey {
  const fromModel = classifyModel(model).normalizedKey;
  if (!isBlank(fromModel)) return { key: fromModel, source: 'model' };

  const fromFileName = classifyText(model.safeTensorFileName).normalizedKey;
  if (!isBlank(fromFileName)) return { key: fromFileName, source: 'fileName' };

  const fromVersion = classifyText(model.modelVersionName).normalizedKey;
  if (!isBlank(fromVersion)) return { key: fromVersion, source: 'versionName' };

  const raw = !isBlank(model.safeTensorFileName) ? model.safeTensorFileName : model.modelVersionName;
  const sanitized = alnumKey(raw);
  if (sanitized) return { key: sanitized, source: 'sanitized' };

  return { key: generateId(), source: 'generated' };
}

export function normalizeKey(model: ModelRecord, generateId: IdGenerator = randomIdGenerator): string {
  return resolveKey(model, generateId).key;
}
