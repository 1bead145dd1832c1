/**
 * Field Arbitrator - one decision per field from letter and digit evidence
 *
 * Priority (first match wins):
 *   1. Exact letter conversion (agrees with digits -> exact_match,
 *      otherwise exact_priority). Confidence 1.0.
 *   2. Fuzzy letter conversion with confidence >= 0.60 (fuzzy_match capped
 *      at 0.95, fuzzy_priority capped at 0.85).
 *   3. Digits only -> needs_escalation; nothing -> unresolved.
 *
 * Digits never override a parsed word: digit misreads are frequent and
 * independent of letter errors.
 *
 * @module services/resolution/arbitrator
 */

import type { LocalDecision } from '../../models/resolution.js';
import { getDefaultLexicon, type Lexicon } from '../lexicon/lexicon.js';
import { convertExact } from './exact-resolver.js';
import { convertFuzzy } from './fuzzy-resolver.js';
import { fingerprintCandidates } from './fingerprint.js';

export const MIN_FUZZY_CONFIDENCE = 0.6;
export const FUZZY_MATCH_CAP = 0.95;
export const FUZZY_PRIORITY_CAP = 0.85;

/** Field values stop at 999 */
const MAX_DIGITS = 3;

/**
 * Integer formed by the digit characters of the digit-form text.
 * Readings above 999 are not evidence for a field value.
 */
export function parseDigitEvidence(digitText: string | null | undefined): number | null {
  if (!digitText) return null;
  const digits = digitText.replace(/[^0-9]/g, '').replace(/^0+(?=\d)/, '');
  if (!digits || digits.length > MAX_DIGITS) return null;
  return parseInt(digits, 10);
}

function percent(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

/** ' Fingerprint hints: 14, 40.' or '' */
function fingerprintHint(letter: string, lexicon: Lexicon): string {
  const values = [...new Set(fingerprintCandidates(letter, lexicon).map((c) => c.value))];
  return values.length > 0 ? ` Fingerprint hints: ${values.join(', ')}.` : '';
}

export function arbitrate(
  letterText: string | null | undefined,
  digitText: string | null | undefined,
  lexicon: Lexicon = getDefaultLexicon()
): LocalDecision {
  const digitValue = parseDigitEvidence(digitText);
  const letter = letterText ?? '';

  const exactValue = convertExact(letter, lexicon);
  if (exactValue !== null) {
    if (digitValue === exactValue) {
      return {
        method: 'exact_match',
        value: exactValue,
        confidence: 1,
        rationale: `Text '${letter}' = ${exactValue}, digits '${digitText}' = ${digitValue}. They agree.`,
      };
    }
    return {
      method: 'exact_priority',
      value: exactValue,
      confidence: 1,
      rationale:
        `Text '${letter}' = ${exactValue}.` +
        (digitValue !== null ? ` Digits say ${digitValue}; text takes priority.` : ''),
    };
  }

  const fuzzy = convertFuzzy(letter, lexicon);
  if (fuzzy.value !== null && fuzzy.confidence >= MIN_FUZZY_CONFIDENCE) {
    if (digitValue === fuzzy.value) {
      return {
        method: 'fuzzy_match',
        value: fuzzy.value,
        confidence: Math.min(fuzzy.confidence, FUZZY_MATCH_CAP),
        rationale: `Corrupted text '${letter}' ≈ ${fuzzy.value} (${percent(fuzzy.confidence)}), digits confirm.`,
      };
    }
    return {
      method: 'fuzzy_priority',
      value: fuzzy.value,
      confidence: Math.min(fuzzy.confidence, FUZZY_PRIORITY_CAP),
      rationale:
        `Corrupted text '${letter}' ≈ ${fuzzy.value} (${percent(fuzzy.confidence)}).` +
        (digitValue !== null ? ` Digits say ${digitValue}.` : ''),
    };
  }

  if (digitValue !== null) {
    return {
      method: 'needs_escalation',
      value: digitValue,
      confidence: 0,
      rationale:
        `Could not convert text '${letter}'. Digits available: '${digitText}'.` +
        fingerprintHint(letter, lexicon),
    };
  }

  return {
    method: 'unresolved',
    value: null,
    confidence: 0,
    rationale: letter
      ? `Could not convert text '${letter}' and no digits were read.` + fingerprintHint(letter, lexicon)
      : 'No letter or digit evidence.',
  };
}
