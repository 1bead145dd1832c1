/**
 * Unit tests for resolver error handling
 *
 * Tests ResolverError, category mapping and error response formatting.
 *
 * @module tests/unit/server/errors
 */

import { describe, it, expect } from 'vitest';
import {
  ResolverError,
  configurationError,
  formatErrorResponse,
  getRecoveryHint,
  type ErrorCategory,
} from '../../../src/server/errors.js';
import { CircuitBreakerOpenError, EscalationError } from '../../../src/services/validator/errors.js';
import { ValidationError } from '../../../src/utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ResolverError CLASS TESTS
// ═══════════════════════════════════════════════════════════════════════════════

describe('ResolverError', () => {
  it('carries category, message and details', () => {
    const error = new ResolverError('LEXICON_ERROR', 'Duplicate word', { word: 'uno' });

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ResolverError');
    expect(error.category).toBe('LEXICON_ERROR');
    expect(error.message).toBe('Duplicate word');
    expect(error.details).toEqual({ word: 'uno' });
  });

  it('serializes through toJSON', () => {
    const json = new ResolverError('INTERNAL_ERROR', 'boom').toJSON();
    expect(json).toMatchObject({ name: 'ResolverError', category: 'INTERNAL_ERROR', message: 'boom' });
  });

  describe('fromUnknown', () => {
    it('returns a ResolverError unchanged', () => {
      const error = new ResolverError('VALIDATION_ERROR', 'bad');
      expect(ResolverError.fromUnknown(error)).toBe(error);
    });

    it('uses the category an escalation error carries', () => {
      const error = new EscalationError('too slow', { category: 'ESCALATION_TIMEOUT' });
      expect(ResolverError.fromUnknown(error).category).toBe('ESCALATION_TIMEOUT');
    });

    it('maps known error names to categories', () => {
      expect(ResolverError.fromUnknown(new ValidationError('x')).category).toBe('VALIDATION_ERROR');
      expect(ResolverError.fromUnknown(new CircuitBreakerOpenError('open', 1000)).category).toBe(
        'ESCALATION_CIRCUIT_OPEN'
      );
    });

    it('falls back to the default category', () => {
      const wrapped = ResolverError.fromUnknown(new Error('oops'));
      expect(wrapped.category).toBe('INTERNAL_ERROR');
      expect(wrapped.details).toMatchObject({ originalName: 'Error' });
      expect(ResolverError.fromUnknown(new Error('oops'), 'LEXICON_ERROR').category).toBe('LEXICON_ERROR');
    });

    it('wraps non-Error values', () => {
      const wrapped = ResolverError.fromUnknown(42);
      expect(wrapped.message).toBe('42');
      expect(wrapped.details).toEqual({ originalValue: 42 });
    });
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

describe('formatErrorResponse', () => {
  it('includes the recovery hint for the category', () => {
    const response = formatErrorResponse(configurationError('bad env', { variable: 'FVR_VALIDATOR_URL' }));
    expect(response).toEqual({
      success: false,
      error: {
        category: 'CONFIGURATION_ERROR',
        message: 'bad env',
        recovery: getRecoveryHint('CONFIGURATION_ERROR'),
        details: { variable: 'FVR_VALIDATOR_URL' },
      },
    });
  });

  it('has a hint naming an fvr_ tool for every category', () => {
    const categories: ErrorCategory[] = [
      'VALIDATION_ERROR',
      'LEXICON_ERROR',
      'ESCALATION_FAILED',
      'ESCALATION_TIMEOUT',
      'ESCALATION_MALFORMED_RESPONSE',
      'ESCALATION_CIRCUIT_OPEN',
      'CONFIGURATION_ERROR',
      'INTERNAL_ERROR',
    ];
    for (const category of categories) {
      expect(getRecoveryHint(category).tool).toMatch(/^fvr_/);
    }
  });
});
