/**
 * Fuzzy Resolver - tolerant conversion of OCR-corrupted number words
 *
 * Per word: nearest lexicon neighbour by Levenshtein distance among
 * words of similar length; when the best neighbour is too far away,
 * fall back to a unique fingerprint (length + first + last letter).
 *
 * 'Calorce'    -> 14 (catorce, distance 1)
 * 'veinisinco' -> 25 (veinticinco, distance 2)
 *
 * @module services/resolution/fuzzy-resolver
 */

import type { LexiconEntry } from '../../models/lexicon.js';
import { fingerprintOf } from '../../models/lexicon.js';
import { levenshtein } from '../lexicon/levenshtein.js';
import { tokenize } from '../lexicon/normalizer.js';
import { getDefaultLexicon, type Lexicon } from '../lexicon/lexicon.js';
import { convertExact, isFieldValue } from './exact-resolver.js';

export interface FuzzyResult {
  value: number | null;
  confidence: number;
}

/** Length ratio token/word outside this band is never compared */
export const LENGTH_RATIO_MIN = 0.65;
export const LENGTH_RATIO_MAX = 1.5;

/** Accepted distance as a share of the candidate word's length */
export const MAX_DISTANCE_RATIO = 0.35;
export const MIN_MAX_DISTANCE = 2;

export const MIN_EDIT_CONFIDENCE = 0.5;
export const FINGERPRINT_BONUS = 0.1;
export const FINGERPRINT_FALLBACK_CONFIDENCE = 0.65;

const NO_MATCH: FuzzyResult = Object.freeze({ value: null, confidence: 0 });

interface ScoredCandidate {
  entry: LexiconEntry;
  distance: number;
  lengthGap: number;
  sharesFingerprint: boolean;
  order: number;
}

function sharesFingerprint(token: string, word: string): boolean {
  return (
    token.length === word.length &&
    token.charAt(0) === word.charAt(0) &&
    token.charAt(token.length - 1) === word.charAt(word.length - 1)
  );
}

/**
 * Ordering for equal-distance neighbours: closer length, then shared
 * fingerprint, then lexicon order.
 */
function compareCandidates(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.lengthGap !== b.lengthGap) return a.lengthGap - b.lengthGap;
  if (a.sharesFingerprint !== b.sharesFingerprint) return a.sharesFingerprint ? -1 : 1;
  return a.order - b.order;
}

/**
 * Resolve a single normalized word.
 */
export function fuzzyWord(token: string, lexicon: Lexicon = getDefaultLexicon()): FuzzyResult {
  if (!token) return NO_MATCH;

  let best: ScoredCandidate | null = null;
  const entries = lexicon.entries;
  for (let order = 0; order < entries.length; order++) {
    const entry = entries[order];
    const ratio = token.length / entry.length;
    if (ratio < LENGTH_RATIO_MIN || ratio > LENGTH_RATIO_MAX) continue;

    const candidate: ScoredCandidate = {
      entry,
      distance: levenshtein(token, entry.word),
      lengthGap: Math.abs(token.length - entry.length),
      sharesFingerprint: sharesFingerprint(token, entry.word),
      order,
    };
    if (best === null || compareCandidates(candidate, best) < 0) {
      best = candidate;
    }
  }

  if (best === null) return NO_MATCH;
  const { entry, distance } = best;

  const maxDistance = Math.max(MIN_MAX_DISTANCE, Math.floor(entry.length * MAX_DISTANCE_RATIO));
  if (distance > maxDistance) {
    if (token.length < 2) return NO_MATCH;
    const unique = lexicon.uniqueFingerprint(fingerprintOf(token));
    return unique ? { value: unique.value, confidence: FINGERPRINT_FALLBACK_CONFIDENCE } : NO_MATCH;
  }

  let confidence = Math.max(MIN_EDIT_CONFIDENCE, 1 - distance / entry.length);
  if (best.sharesFingerprint) {
    confidence = Math.min(1, confidence + FINGERPRINT_BONUS);
  }
  return { value: entry.value, confidence };
}

/**
 * Convert possibly corrupted Spanish number text.
 *
 * Exact conversion first (confidence 1.0). Otherwise every word is looked
 * up exactly or resolved with fuzzyWord(); the compound is the sum and its
 * confidence the weakest word's.
 */
export function convertFuzzy(text: string, lexicon: Lexicon = getDefaultLexicon()): FuzzyResult {
  const exact = convertExact(text, lexicon);
  if (exact !== null) return { value: exact, confidence: 1 };

  const tokens = tokenize(text);
  if (tokens.length === 0) return NO_MATCH;

  if (tokens.length === 1) return fuzzyWord(tokens[0], lexicon);

  let total = 0;
  let weakest = 1;
  for (const token of tokens) {
    const entry = lexicon.lookup(token);
    if (entry) {
      total += entry.value;
      continue;
    }
    const word = fuzzyWord(token, lexicon);
    if (word.value === null) return NO_MATCH;
    total += word.value;
    weakest = Math.min(weakest, word.confidence);
  }

  return isFieldValue(total) ? { value: total, confidence: weakest } : NO_MATCH;
}
