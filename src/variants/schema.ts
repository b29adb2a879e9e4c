// Zod schemas for seed manifests read by the CLI.
// parseManifest(json) throws a ZodError on invalid input.

import { z } from 'zod';
import { normalizeBaseModel } from './baseModel.js';
import type { ModelRecord, Seed } from './types.js';

// Info files write absent values as null as often as they omit them
const text = z
  .string()
  .nullish()
  .transform(v => v ?? '');

export const ModelRecordSchema = z.object({
  modelId: z
    .union([z.string(), z.number()])
    .nullish()
    .transform(v => (v == null ? '' : String(v))),
  diffusionBaseModel: text.transform(normalizeBaseModel),
  modelVersionName: text,
  safeTensorFileName: text,
  sha256Hash: z.string().optional(),
  modelType: z.string().optional(),
  tags: z.array(z.string()).optional(),
});

export const SeedSchema = z.object({
  model: ModelRecordSchema,
  sourcePath: z.string().min(1),
  folderPath: z.string().nullish(),
  treePath: z.string().default(''),
  treeSegments: z.array(z.string()).nullish(),
});

export const ManifestSchema = z.object({
  seeds: z.array(SeedSchema),
});

export function parseModelRecord(input: unknown): ModelRecord {
  return ModelRecordSchema.parse(input);
}

export function parseManifest(input: unknown): Seed[] {
  return ManifestSchema.parse(input).seeds;
}
