// Shared types for the LoRA variant classifier and merge engine.

/**
 * Metadata record for one model file, as produced by the info-file reader.
 * Only the four identity fields are read by the engine; the rest ride along.
 */
export interface ModelRecord {
  modelId: string;
  diffusionBaseModel: string;
  modelVersionName: string;
  safeTensorFileName: string;
  sha256Hash?: string;
  modelType?: string;
  tags?: string[];
}

/** One discovered model file, before classification. */
export interface Seed {
  readonly model: ModelRecord;
  readonly sourcePath: string;
  readonly folderPath?: string | null;
  readonly treePath: string;
  readonly treeSegments?: readonly string[] | null;
}

export const HIGH = 'High';
export const LOW = 'Low';

/** Empty label: the model carries no recognised variant marker. */
export const NO_VARIANT = '';

export interface Classification {
  normalizedKey: string;
  variantLabel: string;
}

export type ClassificationInput =
  | { kind: 'model'; model: ModelRecord }
  | { kind: 'text'; text: string | null | undefined };

export interface VariantDescriptor {
  label: string;
  model: ModelRecord;
}

/** One visible card: a standalone model or a merged High/Low group. */
export interface CardEntry {
  model: ModelRecord;
  normalizedKey: string;
  sourcePath: string;
  folderPath?: string | null;
  treePath: string;
  treeSegments?: readonly string[] | null;
  variants: VariantDescriptor[];
}

/** Source of unique tokens for models whose identity cannot be derived. */
export type IdGenerator = () => string;

export type KeySource = 'model' | 'fileName' | 'versionName' | 'sanitized' | 'generated';

export interface ResolvedKey {
  key: string;
  source: KeySource;
}
