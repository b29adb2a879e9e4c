import { VariantNotFoundError } from './errors.js';
import { HIGH } from './types.js';
import type { CardEntry, VariantDescriptor } from './types.js';
import { equalsIgnoreCase } from '../utils/text.js';

/**
 * The variant a card should show as selected: the one already carrying the
 * card's model, else High, else the first. Undefined for cards without variants.
 */
export function preferredVariant(entry: CardEntry): VariantDescriptor | undefined {
  return (
    entry.variants.find(v => v.model === entry.model) ??
    entry.variants.find(v => equalsIgnoreCase(v.label, HIGH)) ??
    entry.variants[0]
  );
}

export function selectVariant(entry: CardEntry, label: string): CardEntry {
  const match = entry.variants.find(v => equalsIgnoreCase(v.label, label));
  if (!match) {
    throw new VariantNotFoundError(label, entry.variants.map(v => v.label));
  }
  return match.model === entry.model ? entry : { ...entry, model: match.model };
}
