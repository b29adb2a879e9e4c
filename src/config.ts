import 'dotenv/config';

export const cfg = {
  // Log a METRICS line after each CLI run
  metrics: (process.env.LORA_MERGE_METRICS ?? 'false') === 'true',

  // Indentation of the JSON printed by the CLI (0 = single line)
  jsonIndent: Number(process.env.LORA_JSON_INDENT || 2),
};
