/**
 * Exact Resolver - whole-word and additive compound parsing
 *
 * Spanish cardinals up to 999 are additive over units, teens, twenties,
 * tens and hundreds ("cuatrocientos veintiuno" = 400 + 21), so a compound
 * is the sum of its words when every word is an exact lexicon hit.
 * One unknown word fails the whole conversion.
 *
 * @module services/resolution/exact-resolver
 */

import { normalize, tokenize } from '../lexicon/normalizer.js';
import { getDefaultLexicon, type Lexicon } from '../lexicon/lexicon.js';

export const MIN_FIELD_VALUE = 0;
export const MAX_FIELD_VALUE = 999;

export function isFieldValue(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_FIELD_VALUE && value <= MAX_FIELD_VALUE;
}

/**
 * Convert spelled-out Spanish text to an integer, tolerating only case,
 * accents and spacing.
 *
 * @returns the value, or null when any word is unknown or the sum falls outside 0-999
 */
export function convertExact(text: string, lexicon: Lexicon = getDefaultLexicon()): number | null {
  const normalized = normalize(text);
  if (!normalized) return null;

  const single = lexicon.lookup(normalized);
  if (single) return single.value;

  const tokens = tokenize(normalized);
  if (tokens.length === 0) return null;

  let total = 0;
  for (const token of tokens) {
    const entry = lexicon.lookup(token);
    if (!entry) return null;
    total += entry.value;
  }

  return isFieldValue(total) ? total : null;
}
