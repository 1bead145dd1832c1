/**
 * Text normalization for lexicon matching
 *
 * 'Veintitrés' -> 'veintitres'
 * 'Seiscientos  treinta' -> 'seiscientos treinta'
 *
 * @module services/lexicon/normalizer
 */

const COMBINING_MARKS = /[\u0300-\u036f]/g;
const NON_LETTER = /[^a-z\s]/g;
const WHITESPACE_RUN = /\s+/g;

/**
 * Lowercase, strip diacritics (NFD + combining marks), keep only a-z and
 * single spaces.
 */
export function normalize(text: string): string {
  return text
    .toLowerCase()
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .replace(NON_LETTER, '')
    .replace(WHITESPACE_RUN, ' ')
    .trim();
}

/** Spanish "and", joins tens and units ("treinta y dos") */
export const CONNECTIVE = 'y';

/**
 * Normalize and split into word tokens, dropping the "y" connective.
 */
export function tokenize(text: string): string[] {
  const normalized = normalize(text);
  if (!normalized) return [];
  return normalized.split(' ').filter((token) => token !== CONNECTIVE);
}
