// Engine settings for variant classification and merging.
// Can be overridden via environment variables.

export const ENGINE_VERSION = '1.0.0';

function parseExtensions(raw: string): string[] {
  return raw
    .split(',')
    .map(ext => ext.trim().toLowerCase())
    .filter(Boolean)
    .map(ext => (ext.startsWith('.') ? ext : `.${ext}`));
}

export const cfg = {
  // File extensions dropped before a filename is classified
  knownExtensions: parseExtensions(process.env.LORA_KNOWN_EXTENSIONS || '.safetensors,.pt,.ckpt,.bin'),

  // Log group creation and label overwrites during a merge run
  debug: process.env.LORA_MERGE_DEBUG === '1',
};
