/**
 * Evidence classification - pick the letter form and the digit form out
 * of a field's raw OCR tokens.
 *
 * Best-effort heuristic: with more than two tokens per field it can pick
 * the wrong one. Layout noise and printed form instructions are removed
 * first so they never win the "longest alphabetic token" rule.
 *
 * @module services/resolution/evidence
 */

import type { Evidence } from '../../models/field.js';

export const DIGIT_RATIO_THRESHOLD = 0.7;
export const MIN_LETTER_CHARS = 3;
export const MAX_TOKEN_LENGTH = 60;

/** Selection marks and glyphs the OCR layout model emits */
const LAYOUT_NOISE = [':unselected:', ':selected:', '○', '□', '✓', '—', '@'];

/** Printed captions of the form that end up inside field cells */
const FORM_CAPTIONS = [
  '(Con letra)',
  '(Con número)',
  '(Con numera)',
  'Personas que votaron',
  'Representantes',
  'Total de personas',
];

const ACCENT_VARIANTS: Record<string, string> = {
  a: '[aá]',
  e: '[eé]',
  i: '[ií]',
  o: '[oó]',
  u: '[uúü]',
  n: '[nñ]',
};

/**
 * One pattern matching every caption regardless of case and accents
 */
function captionPattern(captions: readonly string[]): RegExp {
  const alternatives = captions.map((caption) =>
    caption
      .normalize('NFD')
      .replace(/\p{M}/gu, '')
      .toLowerCase()
      .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
      .replace(/[aeioun]/g, (letter) => ACCENT_VARIANTS[letter] ?? letter)
  );
  return new RegExp(alternatives.join('|'), 'giu');
}

const CAPTION = captionPattern(FORM_CAPTIONS);

const INSTRUCTION_PREFIXES = ['copie', 'escriba'];
const INSTRUCTION_FRAGMENTS = ['del apartado', 'de la hoja'];

// ASCII only: parseDigitEvidence reads [0-9]
const DIGIT = /[0-9]/g;
const LETTER = /\p{L}/gu;
const WHITESPACE = /\s+/g;
const EDGE_PUNCTUATION = /^[\s.\-_,]+|[\s.\-_,]+$/g;

/**
 * Strip layout noise and captions from one token. Returns '' when the
 * token is a printed instruction rather than handwriting.
 */
export function cleanToken(raw: string): string {
  let text = raw.replace(/\n/g, ' ');
  for (const noise of LAYOUT_NOISE) text = text.split(noise).join('');
  text = text.replace(CAPTION, '');
  text = text.replace(EDGE_PUNCTUATION, '').replace(WHITESPACE, ' ');

  const lower = text.toLowerCase();
  if (
    INSTRUCTION_PREFIXES.some((prefix) => lower.startsWith(prefix)) ||
    INSTRUCTION_FRAGMENTS.some((fragment) => lower.includes(fragment)) ||
    text.length > MAX_TOKEN_LENGTH
  ) {
    return '';
  }
  return text;
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

/**
 * Share of digit characters among the non-whitespace characters
 */
export function digitRatio(token: string): number {
  const compact = token.replace(WHITESPACE, '');
  if (compact.length === 0) return 0;
  return countMatches(compact, DIGIT) / compact.length;
}

/**
 * Classify a field's tokens into letter and digit evidence.
 *
 * digitText: first token with digit ratio >= 0.70.
 * letterText: longest token with at least 3 letters (first one on ties).
 */
export function classifyEvidence(contents: readonly string[]): Evidence {
  let digitText: string | null = null;
  let letterText: string | null = null;

  for (const raw of contents) {
    const token = cleanToken(raw);
    if (!token) continue;

    if (digitText === null && digitRatio(token) >= DIGIT_RATIO_THRESHOLD) {
      digitText = token;
    }
    if (
      countMatches(token, LETTER) >= MIN_LETTER_CHARS &&
      (letterText === null || token.length > letterText.length)
    ) {
      letterText = token;
    }
  }

  return { letterText, digitText };
}
