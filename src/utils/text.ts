/**
 * Character and string helpers shared by the variant classifier.
 * Letter/digit tests are Unicode-aware so accented names tokenize like ASCII ones.
 */

const LETTER = /\p{L}/u;
const LOWER = /\p{Ll}/u;
const UPPER = /\p{Lu}/u;
const DIGIT = /\p{Nd}/u;
const NON_ALNUM = /[^\p{L}\p{Nd}]/gu;

export function isBlank(s?: string | null): boolean {
  return !s || s.trim().length === 0;
}

export function equalsIgnoreCase(a?: string | null, b?: string | null): boolean {
  if (a == null || b == null) return a == b;
  return a.toLowerCase() === b.toLowerCase();
}

export function isLetter(ch?: string): boolean {
  return !!ch && LETTER.test(ch);
}

export function isLowerLetter(ch?: string): boolean {
  return !!ch && LOWER.test(ch);
}

export function isUpperLetter(ch?: string): boolean {
  return !!ch && UPPER.test(ch);
}

export function isDigit(ch?: string): boolean {
  return !!ch && DIGIT.test(ch);
}

export function isLetterOrDigit(ch?: string): boolean {
  return isLetter(ch) || isDigit(ch);
}

export function allDigits(s: string): boolean {
  return Array.from(s).every(isDigit);
}

export function hasLetter(s: string): boolean {
  return Array.from(s).some(isLetter);
}

/**
 * Strip everything that is not a letter or digit and lowercase the rest.
 * "Wan 2.2 - Cool_Style" -> "wan22coolstyle"
 */
export function alnumKey(s?: string | null): string {
  return (s || '').replace(NON_ALNUM, '').toLowerCase();
}

/**
 * Case-insensitive indexOf. Offsets line up with the original string except
 * around the rare characters whose lowercase form has a different length.
 */
export function indexOfIgnoreCase(haystack: string, needle: string, from = 0): number {
  return haystack.toLowerCase().indexOf(needle.toLowerCase(), from);
}
