/**
 * Unit tests for the batch resolution pipeline
 *
 * Uses an in-process BatchValidator stand-in; no network.
 *
 * @module tests/unit/resolution/pipeline
 */

import { describe, it, expect, vi } from 'vitest';
import {
  LABEL_CONFIDENCE,
  isLocallyAccepted,
  resolveDocument,
  resolveField,
} from '../../../src/services/resolution/pipeline.js';
import type { RawFieldCandidate } from '../../../src/models/field.js';
import type {
  EscalationBatch,
  ExternalAnswers,
  ExternalFieldAnswer,
} from '../../../src/models/resolution.js';

// ═══════════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════════

function field(tableId: number, fieldId: string, ...contents: string[]): RawFieldCandidate {
  return { tableId, fieldId, contents };
}

function answer(
  tableId: number,
  fieldId: string,
  value: number | null,
  confidenceLabel: ExternalFieldAnswer['confidenceLabel'] = 'alta'
): ExternalFieldAnswer {
  return { tableId, fieldId, value, confidenceLabel, rationale: `reviewed ${fieldId}` };
}

function validatorReturning(result: () => Promise<ExternalAnswers>) {
  return vi.fn((_batch: EscalationBatch, _options?: { signal?: AbortSignal }) => result());
}

/**
 * Table 1: exact, fuzzy confirmed by digits, digits only.
 * Table 2: fuzzy above threshold, no evidence, fuzzy below threshold.
 */
const DOCUMENT: RawFieldCandidate[] = [
  field(1, 'votos_a', 'Treinta y Cinco', '035'),
  field(1, 'votos_b', 'Calorce', '14'),
  field(1, 'votos_c', 'Selcarta', '60'),
  field(2, 'total_a', 'veinisinco'),
  field(2, 'total_b', 'Despula'),
  field(2, 'total_c', 'Ochodeutos', '800'),
];

const FULL_ANSWERS: ExternalAnswers = new Map([
  [1, [answer(1, 'votos_c', 60)]],
  [2, [answer(2, 'total_c', 800, 'media'), answer(2, 'total_b', null, 'baja')]],
]);

// ═══════════════════════════════════════════════════════════════════════════════
// LOCAL ACCEPTANCE
// ═══════════════════════════════════════════════════════════════════════════════

describe('isLocallyAccepted', () => {
  it('accepts letter-derived values at or above the threshold', () => {
    const exact = resolveField(DOCUMENT[0]).result;
    const fuzzyLow = resolveField(DOCUMENT[5]).result;

    expect(isLocallyAccepted(exact, 0.75)).toBe(true);
    expect(isLocallyAccepted(exact, 1)).toBe(true);
    expect(isLocallyAccepted(fuzzyLow, 0.75)).toBe(false);
    expect(isLocallyAccepted(fuzzyLow, 0.7)).toBe(true);
  });

  it('never accepts needs_escalation or unresolved', () => {
    expect(isLocallyAccepted(resolveField(DOCUMENT[2]).result, 0)).toBe(false);
    expect(isLocallyAccepted(resolveField(DOCUMENT[4]).result, 0)).toBe(false);
  });

  it('attaches field and table ids to the local decision', () => {
    const { result, evidence } = resolveField(DOCUMENT[1]);
    expect(evidence).toEqual({ letterText: 'Calorce', digitText: '14' });
    expect(result).toMatchObject({
      fieldId: 'votos_b',
      tableId: 1,
      origin: 'local',
      method: 'fuzzy_match',
      value: 14,
      confidence: 0.95,
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// SUCCESSFUL ESCALATION
// ═══════════════════════════════════════════════════════════════════════════════

describe('resolveDocument - with a validator', () => {
  it('escalates low-confidence fields in a single batch', async () => {
    const validateBatch = validatorReturning(async () => FULL_ANSWERS);
    await resolveDocument(DOCUMENT, { validateBatch });

    expect(validateBatch).toHaveBeenCalledTimes(1);
    const batch = validateBatch.mock.calls[0][0];
    expect([...batch.keys()]).toEqual([1, 2]);
    expect(batch.get(1)?.map((f) => f.fieldId)).toEqual(['votos_c']);
    expect(batch.get(2)?.map((f) => f.fieldId)).toEqual(['total_b', 'total_c']);
  });

  it('merges local and external results in field order', async () => {
    const resolution = await resolveDocument(DOCUMENT, {
      validateBatch: validatorReturning(async () => FULL_ANSWERS),
    });

    expect(resolution.partial).toBe(false);
    expect(resolution.escalation).toEqual({
      status: 'resolved',
      requestedFields: 3,
      answeredFields: 3,
    });
    expect(resolution.tables.map((t) => t.tableId)).toEqual([1, 2]);
    expect(resolution.results.map((r) => [r.fieldId, r.method, r.value])).toEqual([
      ['votos_a', 'exact_match', 35],
      ['votos_b', 'fuzzy_match', 14],
      ['votos_c', 'external', 60],
      ['total_a', 'fuzzy_priority', 25],
      ['total_b', 'external', null],
      ['total_c', 'external', 800],
    ]);
  });

  it('keeps the label confidences frozen', () => {
    expect(Object.isFrozen(LABEL_CONFIDENCE)).toBe(true);
    expect(LABEL_CONFIDENCE).toEqual({ alta: 0.9, media: 0.6, baja: 0.3 });
  });

  it('maps confidence labels to numeric confidence', async () => {
    const resolution = await resolveDocument(DOCUMENT, {
      validateBatch: validatorReturning(async () => FULL_ANSWERS),
    });
    const byId = new Map(resolution.results.map((r) => [r.fieldId, r]));

    expect(byId.get('votos_c')).toEqual({
      fieldId: 'votos_c',
      tableId: 1,
      method: 'external',
      origin: 'external',
      value: 60,
      confidence: LABEL_CONFIDENCE.alta,
      confidenceLabel: 'alta',
      rationale: 'reviewed votos_c',
    });
    expect(byId.get('total_c')?.confidence).toBe(0.6);
    // no value, no confidence
    expect(byId.get('total_b')?.confidence).toBe(0);
  });

  it('appends answers for unknown fields and tables, first duplicate wins', async () => {
    const answers: ExternalAnswers = new Map([
      [1, [answer(1, 'votos_c', 61), answer(1, 'votos_c', 99), answer(1, 'extra', 3)]],
      [7, [answer(7, 'otra', 4)]],
    ]);
    const resolution = await resolveDocument(DOCUMENT.slice(0, 3), {
      validateBatch: validatorReturning(async () => answers),
    });

    expect(resolution.tables.map((t) => t.tableId)).toEqual([1, 7]);
    expect(resolution.tables[0].results.map((r) => [r.fieldId, r.value])).toEqual([
      ['votos_a', 35],
      ['votos_b', 14],
      ['votos_c', 61],
      ['extra', 3],
    ]);
    expect(resolution.tables[1].results.map((r) => [r.fieldId, r.value])).toEqual([['otra', 4]]);
  });

  it('keeps a local result when the validator also answers it', async () => {
    const answers: ExternalAnswers = new Map([
      [1, [answer(1, 'votos_a', 99), answer(1, 'votos_c', 60)]],
    ]);
    const resolution = await resolveDocument(DOCUMENT.slice(0, 3), {
      validateBatch: validatorReturning(async () => answers),
    });

    expect(resolution.results.map((r) => [r.fieldId, r.value])).toEqual([
      ['votos_a', 35],
      ['votos_b', 14],
      ['votos_c', 60],
    ]);
  });

  it('flags a partial result when some fields get no answer', async () => {
    const answers: ExternalAnswers = new Map([[1, [answer(1, 'votos_c', 60)]]]);
    const resolution = await resolveDocument(DOCUMENT, {
      validateBatch: validatorReturning(async () => answers),
    });

    expect(resolution.partial).toBe(true);
    expect(resolution.escalation).toEqual({
      status: 'resolved',
      requestedFields: 3,
      answeredFields: 1,
    });
    const totalB = resolution.results.find((r) => r.fieldId === 'total_b');
    expect(totalB?.method).toBe('unresolved');
    expect(totalB?.rationale).toBe(
      "Could not convert text 'Despula' and no digits were read. Validator returned no answer for this field."
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// DEGRADED ESCALATION
// ═══════════════════════════════════════════════════════════════════════════════

describe('resolveDocument - degraded escalation', () => {
  it('returns local results and unresolved placeholders when the validator fails', async () => {
    const resolution = await resolveDocument(DOCUMENT, {
      validateBatch: validatorReturning(async () => {
        throw new Error('boom');
      }),
    });

    expect(resolution.partial).toBe(true);
    expect(resolution.escalation).toEqual({
      status: 'failed',
      requestedFields: 3,
      answeredFields: 0,
      error: 'boom',
    });
    expect(resolution.results.map((r) => [r.fieldId, r.method, r.value])).toEqual([
      ['votos_a', 'exact_match', 35],
      ['votos_b', 'fuzzy_match', 14],
      ['votos_c', 'unresolved', null],
      ['total_a', 'fuzzy_priority', 25],
      ['total_b', 'unresolved', null],
      ['total_c', 'unresolved', null],
    ]);
    expect(resolution.results[2].rationale).toBe(
      "Could not convert text 'Selcarta'. Digits available: '60'. Fingerprint hints: 60, 70. Escalation failed: boom"
    );
  });

  it('leaves locally accepted results unchanged on failure', async () => {
    const ok = await resolveDocument(DOCUMENT, {
      validateBatch: validatorReturning(async () => FULL_ANSWERS),
    });
    const failed = await resolveDocument(DOCUMENT, {
      validateBatch: validatorReturning(async () => {
        throw new Error('boom');
      }),
    });

    for (const index of [0, 1, 3]) {
      expect(failed.results[index]).toEqual(ok.results[index]);
    }
  });

  it('skips escalation without a validator', async () => {
    const resolution = await resolveDocument(DOCUMENT, null);

    expect(resolution.partial).toBe(true);
    expect(resolution.escalation).toEqual({
      status: 'skipped',
      requestedFields: 3,
      answeredFields: 0,
    });
    expect(resolution.results[4].rationale).toBe(
      "Could not convert text 'Despula' and no digits were read. Escalation skipped: no validator configured."
    );
  });

  it('returns the local partial result when the caller aborts', async () => {
    const controller = new AbortController();
    const validateBatch = validatorReturning(() => new Promise<ExternalAnswers>(() => undefined));

    const pending = resolveDocument(DOCUMENT, { validateBatch }, { signal: controller.signal });
    controller.abort();
    const resolution = await pending;

    expect(resolution.escalation.status).toBe('aborted');
    expect(resolution.partial).toBe(true);
    expect(resolution.results.filter((r) => r.value !== null).map((r) => r.fieldId)).toEqual([
      'votos_a',
      'votos_b',
      'total_a',
    ]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// GATING AND ORDERING
// ═══════════════════════════════════════════════════════════════════════════════

describe('resolveDocument - gating and ordering', () => {
  it('does not call the validator when every field is accepted locally', async () => {
    const validateBatch = validatorReturning(async () => new Map());
    const resolution = await resolveDocument(DOCUMENT.slice(0, 2), { validateBatch });

    expect(validateBatch).not.toHaveBeenCalled();
    expect(resolution.partial).toBe(false);
    expect(resolution.escalation).toEqual({
      status: 'not_needed',
      requestedFields: 0,
      answeredFields: 0,
    });
  });

  it('honours a custom acceptance threshold', async () => {
    const lenient = await resolveDocument(DOCUMENT, null, { acceptanceThreshold: 0.7 });
    expect(lenient.escalation.requestedFields).toBe(2);

    const strict = await resolveDocument(DOCUMENT, null, { acceptanceThreshold: 1 });
    expect(strict.escalation.requestedFields).toBe(5);
  });

  it('orders tables by first appearance', async () => {
    const resolution = await resolveDocument(
      [field(2, 'b1', 'doce'), field(1, 'a1', 'once'), field(2, 'b2', 'trece')],
      null
    );

    expect(resolution.tables.map((t) => [t.tableId, t.results.map((r) => r.fieldId)])).toEqual([
      [2, ['b1', 'b2']],
      [1, ['a1']],
    ]);
  });

  it('produces identical output for identical input', async () => {
    const first = await resolveDocument(DOCUMENT, null);
    const second = await resolveDocument(DOCUMENT, null);
    expect(second).toEqual(first);
  });

  it('produces identical output with a deterministic validator', async () => {
    // Answers every escalated field, last field first
    const validateBatch = vi.fn(async (batch: EscalationBatch): Promise<ExternalAnswers> => {
      const answers: ExternalAnswers = new Map();
      for (const [tableId, fields] of batch) {
        answers.set(
          tableId,
          [...fields].reverse().map((f) => answer(tableId, f.fieldId, f.contents.length, 'media'))
        );
      }
      return answers;
    });

    const first = await resolveDocument(DOCUMENT, { validateBatch });
    const second = await resolveDocument(DOCUMENT, { validateBatch });

    expect(validateBatch).toHaveBeenCalledTimes(2);
    expect(second).toEqual(first);
    expect(first.partial).toBe(false);
    expect(first.results.map((r) => [r.fieldId, r.method, r.value])).toEqual([
      ['votos_a', 'exact_match', 35],
      ['votos_b', 'fuzzy_match', 14],
      ['votos_c', 'external', 2],
      ['total_a', 'fuzzy_priority', 25],
      ['total_b', 'external', 1],
      ['total_c', 'external', 2],
    ]);
  });

  it('returns an empty resolution for an empty document', async () => {
    expect(await resolveDocument([], null)).toEqual({
      results: [],
      tables: [],
      partial: false,
      escalation: { status: 'not_needed', requestedFields: 0, answeredFields: 0 },
    });
  });
});
