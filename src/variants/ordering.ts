import { HIGH, LOW } from './types.js';
import type { VariantDescriptor } from './types.js';
import { equalsIgnoreCase } from '../utils/text.js';

export function variantOrder(label: string): number {
  if (equalsIgnoreCase(label, HIGH)) return 0;
  if (equalsIgnoreCase(label, LOW)) return 1;
  return 2;
}

/** High, then Low, then everything else; ties by label, case-insensitive. */
export function compareVariantLabels(a: string, b: string): number {
  const byOrder = variantOrder(a) - variantOrder(b);
  if (byOrder !== 0) return byOrder;

  const la = a.toLowerCase();
  const lb = b.toLowerCase();
  return la < lb ? -1 : la > lb ? 1 : 0;
}

export function sortVariants(variants: VariantDescriptor[]): VariantDescriptor[] {
  return [...variants].sort((a, b) => compareVariantLabels(a.label, b.label));
}
