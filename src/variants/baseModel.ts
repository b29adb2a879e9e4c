/**
 * Declared base-model names as written by Civitai info files.
 */

const UNKNOWN = 'UNKNOWN';

const ALIASES = new Map<string, string>([
  ['sdxl 1.0', 'SDXL'],
]);

export function normalizeBaseModel(value?: string | null): string {
  const trimmed = (value || '').trim();
  return ALIASES.get(trimmed.toLowerCase()) ?? trimmed;
}

/** Folder name used when cards are grouped by base model; null when there is none. */
export function baseModelFolderName(value?: string | null): string | null {
  const normalized = normalizeBaseModel(value);
  if (!normalized || normalized.toUpperCase() === UNKNOWN) return null;
  return normalized;
}
