/**
 * Fingerprint probe - candidate values from length + first/last letter only
 *
 * For text too corrupted for edit distance. Diagnostic: the arbitrator
 * never accepts these candidates, they only annotate escalated fields.
 *
 * @module services/resolution/fingerprint
 */

import { fingerprintOf } from '../../models/lexicon.js';
import { tokenize } from '../lexicon/normalizer.js';
import { getDefaultLexicon, type Lexicon } from '../lexicon/lexicon.js';

export interface FingerprintCandidate {
  word: string;
  value: number;
  confidence: number;
}

export const SAME_LENGTH_CONFIDENCE = 0.65;
export const NEAR_LENGTH_CONFIDENCE = 0.5;

/**
 * List lexicon words sharing the fingerprint of a single-word text.
 * When none match exactly, words one letter shorter or longer with the
 * same first and last letters are returned at lower confidence.
 */
export function fingerprintCandidates(
  text: string,
  lexicon: Lexicon = getDefaultLexicon()
): FingerprintCandidate[] {
  const tokens = tokenize(text).filter((token) => token.length >= 2);
  if (tokens.length !== 1) return [];

  const fp = fingerprintOf(tokens[0]);
  const exact = lexicon.withFingerprint(fp);
  if (exact.length > 0) {
    return exact.map((e) => ({ word: e.word, value: e.value, confidence: SAME_LENGTH_CONFIDENCE }));
  }

  const near: FingerprintCandidate[] = [];
  for (const delta of [-1, 1]) {
    for (const e of lexicon.withFingerprint({ ...fp, length: fp.length + delta })) {
      near.push({ word: e.word, value: e.value, confidence: NEAR_LENGTH_CONFIDENCE });
    }
  }
  return near;
}
