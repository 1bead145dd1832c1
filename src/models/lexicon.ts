/**
 * Lexicon models - Spanish number words with their fingerprints
 */

/**
 * Coarse word signature used when edit distance is unreliable.
 * Two words share a fingerprint when they have the same length and the
 * same first and last letters.
 */
export interface Fingerprint {
  length: number;
  firstChar: string;
  lastChar: string;
}

/**
 * One number word. Words are lowercase, accent-free, a-z only.
 */
export interface LexiconEntry extends Fingerprint {
  word: string;
  value: number;
}

/**
 * Diagnostic summary of a loaded lexicon
 */
export interface LexiconInfo {
  words: number;
  fingerprints: number;
  uniqueFingerprints: number;
  minValue: number;
  maxValue: number;
}

/**
 * Serialize a fingerprint to a map key, e.g. `7:c:e` for "catorce"
 */
export function fingerprintKey(fp: Fingerprint): string {
  return `${fp.length}:${fp.firstChar}:${fp.lastChar}`;
}

/**
 * Compute the fingerprint of a non-empty normalized word
 */
export function fingerprintOf(word: string): Fingerprint {
  return {
    length: word.length,
    firstChar: word.charAt(0),
    lastChar: word.charAt(word.length - 1),
  };
}
