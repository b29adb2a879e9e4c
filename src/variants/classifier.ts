// High/Low noise variant detection and grouping-key derivation.
// Input: a model record or a raw filename/version string.
// Output: { normalizedKey, variantLabel }. Pure; no I/O, no state.

import path from 'path';
import { cfg } from './config.js';
import { HIGH, LOW, NO_VARIANT } from './types.js';
import type { Classification, ClassificationInput, ModelRecord } from './types.js';
import {
  allDigits,
  equalsIgnoreCase,
  hasLetter,
  indexOfIgnoreCase,
  isBlank,
  isDigit,
  isLetterOrDigit,
  isLowerLetter,
  isUpperLetter,
} from '../utils/text.js';

const VARIANT_LABELS: ReadonlyArray<readonly [string, string]> = [
  ['highnoise', HIGH],
  ['high_noise', HIGH],
  ['high', HIGH],
  ['hn', HIGH],
  ['lownoise', LOW],
  ['low_noise', LOW],
  ['low', LOW],
  ['ln', LOW],
];

const LABEL_BY_MARKER = new Map<string, string>(VARIANT_LABELS);

// Longest marker first so "high_noise" wins over "high"
const MARKERS_BY_LENGTH = [...VARIANT_LABELS].sort((a, b) => b[0].length - a[0].length);

const TOKEN_SEPARATORS = /[ _\-.()[\]{}]+/;

const EMPTY: Classification = { normalizedKey: '', variantLabel: NO_VARIANT };

export function classify(input: ClassificationInput): Classification {
  return input.kind === 'model' ? classifyModel(input.model) : classifyText(input.text);
}

/**
 * Structured record: the safetensor filename is classified first; the version
 * name fills in whichever of label/key the filename could not provide.
 */
export function classifyModel(model: ModelRecord): Classification {
  const primary = classifySource(normalizeSource(model.safeTensorFileName));
  if (!requiresFallback(primary)) return primary;

  const fallback = classifySource(normalizeSource(model.modelVersionName));
  return {
    normalizedKey: isBlank(primary.normalizedKey) ? fallback.normalizedKey : primary.normalizedKey,
    variantLabel: isBlank(primary.variantLabel) ? fallback.variantLabel : primary.variantLabel,
  };
}

export function classifyText(text: string | null | undefined): Classification {
  return classifySource(normalizeSource(text));
}

/** Label a single marker token such as "HN" or "low_noise"; "" when unknown. */
export function labelForMarker(marker: string): string {
  return LABEL_BY_MARKER.get(marker.toLowerCase()) ?? NO_VARIANT;
}

function requiresFallback(c: Classification): boolean {
  return isBlank(c.variantLabel) || isBlank(c.normalizedKey);
}

function normalizeSource(value: string | null | undefined): string | null {
  if (isBlank(value) || value == null) return null;

  const trimmed = value.trim();
  const ext = path.extname(trimmed);
  if (ext && cfg.knownExtensions.includes(ext.toLowerCase())) {
    const withoutExt = path.basename(trimmed, ext);
    return isBlank(withoutExt) ? trimmed : withoutExt;
  }
  return trimmed;
}

function classifySource(source: string | null): Classification {
  if (source == null || isBlank(source)) return { ...EMPTY };

  const tokens = tokenize(source);
  const label = detectVariantLabel(source, tokens);
  return { normalizedKey: buildNormalizedKey(source, label), variantLabel: label };
}

function tokenize(source: string): string[] {
  return source
    .split(TOKEN_SEPARATORS)
    .map(t => t.trim())
    .filter(t => t.length > 0);
}

function detectVariantLabel(source: string, tokens: string[]): string {
  const fromSegments = detectFromBoundedSegments(source);
  if (fromSegments) return fromSegments;

  for (const token of tokens) {
    const label = detectFromToken(token);
    if (label) return label;
  }
  return NO_VARIANT;
}

// "_high_", "-LN.", "(HIGH Noise)" ... any marker bounded by non-alphanumerics
function detectFromBoundedSegments(source: string): string {
  for (const [marker, label] of MARKERS_BY_LENGTH) {
    if (findBounded(source, marker, 0) >= 0) return label;
  }
  return NO_VARIANT;
}

function detectFromToken(token: string): string {
  const exact = labelForMarker(token);
  if (exact) return exact;

  const trimmed = trimNumericEdges(token);
  if (!equalsIgnoreCase(trimmed, token)) {
    const fromTrimmed = labelForMarker(trimmed);
    if (fromTrimmed) return fromTrimmed;
  }

  return detectEmbedded(trimmed);
}

// "PAINTERLYHIGHNOISEV2": marker inside a token, not touching lowercase letters
function detectEmbedded(token: string): string {
  for (const [marker, label] of MARKERS_BY_LENGTH) {
    let index = indexOfIgnoreCase(token, marker);
    while (index >= 0) {
      const before = index > 0 ? token[index - 1] : undefined;
      const after = token[index + marker.length];
      if (!isLowerLetter(before) && !isLowerLetter(after)) return label;
      index = indexOfIgnoreCase(token, marker, index + 1);
    }
  }
  return NO_VARIANT;
}

function buildNormalizedKey(source: string, label: string): string {
  const tokens = tokenize(removeVariantSegments(source));
  const parts: string[] = [];

  tokens.forEach((token, i) => {
    const lower = token.toLowerCase();
    if (LABEL_BY_MARKER.has(lower) || lower === 'noise' || isVersionToken(lower)) return;

    // Bare numbers survive only when something alphabetic follows ("wan 2 final");
    // mixed tokens that start with a digit ("100epoc", "14B") never do.
    if (isDigit(lower[0])) {
      if (!allDigits(lower) || !hasSubsequentAlphabeticToken(tokens, i)) return;
    }

    const normalized = normalizeToken(token, label);
    if (!isBlank(normalized)) parts.push(normalized);
  });

  return parts.join('').toLowerCase();
}

function removeVariantSegments(source: string): string {
  let result = source;
  for (const [marker] of MARKERS_BY_LENGTH) {
    let found = findBounded(result, marker, 0);
    while (found >= 0) {
      result = result.slice(0, found) + result.slice(found + marker.length);
      found = findBounded(result, marker, found);
    }
  }
  return result;
}

/** Index of `marker` at or after `from` with non-alphanumeric neighbours, else -1. */
function findBounded(source: string, marker: string, from: number): number {
  let index = from;
  while (index < source.length) {
    const found = indexOfIgnoreCase(source, marker, index);
    if (found < 0) return -1;

    const end = found + marker.length;
    const startOk = found === 0 || !isLetterOrDigit(source[found - 1]);
    const endOk = end >= source.length || !isLetterOrDigit(source[end]);
    if (startOk && endOk) return found;

    index = found + 1;
  }
  return -1;
}

function normalizeToken(token: string, label: string): string {
  if (isBlank(label)) return token;

  let result = token;
  if (equalsIgnoreCase(label, HIGH)) {
    result = trimMarkerSuffix(result, 'hn');
    result = trimMarkerSuffix(result, 'h');
  } else if (equalsIgnoreCase(label, LOW)) {
    result = trimMarkerSuffix(result, 'ln');
    result = trimMarkerSuffix(result, 'l');
  }

  for (const [marker, markerLabel] of VARIANT_LABELS) {
    if (equalsIgnoreCase(markerLabel, label)) result = removeAll(result, marker);
  }
  return result;
}

function removeAll(token: string, marker: string): string {
  let result = token;
  let index = indexOfIgnoreCase(result, marker);
  while (index >= 0) {
    result = result.slice(0, index) + result.slice(index + marker.length);
    index = indexOfIgnoreCase(result, marker);
  }
  return result;
}

// "FloraBloomH" -> "FloraBloom" for a High file; "E20H" and lowercase "bath" stay.
function trimMarkerSuffix(token: string, suffix: string): string {
  if (token.length <= suffix.length) return token;
  if (!token.toLowerCase().endsWith(suffix)) return token;

  const segment = token.slice(-suffix.length);
  if (!Array.from(segment).some(isUpperLetter)) return token;

  const preceding = token[token.length - suffix.length - 1];
  return isDigit(preceding) ? token : token.slice(0, -suffix.length);
}

function trimNumericEdges(token: string): string {
  let start = 0;
  while (start < token.length && isDigit(token[start])) start++;

  let end = token.length - 1;
  while (end >= start && isDigit(token[end])) end--;

  return start > end ? '' : token.slice(start, end + 1);
}

// v, v2, ver1, version3, e20, epoch10
function isVersionToken(token: string): boolean {
  if (!token) return false;
  if (token.startsWith('ver') || token.startsWith('epoch') || token === 'v') return true;
  if ((token[0] === 'v' || token[0] === 'e') && token.length > 1 && allDigits(token.slice(1))) return true;
  return false;
}

function hasSubsequentAlphabeticToken(tokens: string[], index: number): boolean {
  for (let i = index + 1; i < tokens.length; i++) {
    const lower = tokens[i].toLowerCase();
    if (LABEL_BY_MARKER.has(lower) || isVersionToken(lower) || allDigits(lower)) continue;
    if (hasLetter(lower)) return true;
  }
  return false;
}
