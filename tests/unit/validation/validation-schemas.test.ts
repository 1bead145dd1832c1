/**
 * Unit tests for tool input and validator response schemas
 *
 * @module tests/unit/validation/validation-schemas
 */

import { describe, it, expect } from 'vitest';
import {
  ArbitrateFieldInput,
  ExternalAnswersSchema,
  ResolveDocumentInput,
  ValidationError,
  ValidatorResponseBody,
  validateInput,
} from '../../../src/utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// validateInput
// ═══════════════════════════════════════════════════════════════════════════════

describe('validateInput', () => {
  it('returns parsed data with defaults applied', () => {
    const input = validateInput(ResolveDocumentInput, {
      fields: [{ field_id: ' votos ', table_id: 1, contents: ['doce'] }],
    });
    expect(input.escalate).toBe(true);
    expect(input.fields[0].field_id).toBe('votos');
  });

  it('lists every failed constraint', () => {
    expect(() =>
      validateInput(ResolveDocumentInput, {
        fields: [{ field_id: '', table_id: 1.5, contents: [] }],
      })
    ).toThrow(
      new ValidationError('fields.0.field_id: field_id is required; fields.0.table_id: table_id must be an integer')
    );
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL INPUTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('ArbitrateFieldInput', () => {
  it('accepts any single source of evidence', () => {
    expect(ArbitrateFieldInput.safeParse({ contents: [] }).success).toBe(true);
    expect(ArbitrateFieldInput.safeParse({ letter_text: 'doce' }).success).toBe(true);
    expect(ArbitrateFieldInput.safeParse({ digit_text: '12' }).success).toBe(true);
  });

  it('rejects an empty request', () => {
    expect(ArbitrateFieldInput.safeParse({}).success).toBe(false);
  });
});

describe('ResolveDocumentInput', () => {
  const fields = [{ field_id: 'a', table_id: 0, contents: ['uno'] }];

  it('bounds threshold and timeout', () => {
    expect(ResolveDocumentInput.safeParse({ fields, acceptance_threshold: 1.1 }).success).toBe(false);
    expect(ResolveDocumentInput.safeParse({ fields, timeout_ms: 50 }).success).toBe(false);
    expect(ResolveDocumentInput.safeParse({ fields, acceptance_threshold: 0, timeout_ms: 100 }).success).toBe(
      true
    );
  });

  it('rejects negative table ids', () => {
    expect(ResolveDocumentInput.safeParse({ fields: [{ ...fields[0], table_id: -1 }] }).success).toBe(false);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// VALIDATOR RESPONSES
// ═══════════════════════════════════════════════════════════════════════════════

describe('ValidatorResponseBody', () => {
  it('defaults a missing rationale to an empty string', () => {
    const parsed = ValidatorResponseBody.parse({
      results: [{ fieldId: 'a', tableId: 1, value: null, confidenceLabel: 'baja' }],
    });
    expect(parsed.results[0].rationale).toBe('');
  });

  it('rejects unknown labels and out-of-range values', () => {
    const base = { fieldId: 'a', tableId: 1, value: 5, confidenceLabel: 'alta' };
    expect(ValidatorResponseBody.safeParse({ results: [{ ...base, confidenceLabel: 'high' }] }).success).toBe(
      false
    );
    expect(ValidatorResponseBody.safeParse({ results: [{ ...base, value: 1000 }] }).success).toBe(false);
    expect(ValidatorResponseBody.safeParse({ results: [{ ...base, value: 2.5 }] }).success).toBe(false);
  });
});

describe('ExternalAnswersSchema', () => {
  it('validates answers grouped by table', () => {
    const answers = new Map([[1, [{ fieldId: 'a', tableId: 1, value: 3, confidenceLabel: 'media' }]]]);
    const parsed = ExternalAnswersSchema.parse(answers);
    expect(parsed.get(1)).toEqual([
      { fieldId: 'a', tableId: 1, value: 3, confidenceLabel: 'media', rationale: '' },
    ]);
  });
});
