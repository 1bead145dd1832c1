/**
 * Resolver Error Handling
 *
 * Tool-facing errors carry a category, a message and optional details.
 * Escalation failures never reach this layer from resolveDocument();
 * the pipeline degrades them to partial results.
 *
 * @module server/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  // Validation errors
  | 'VALIDATION_ERROR'

  // Lexicon errors
  | 'LEXICON_ERROR'

  // Escalation (external validator) errors
  | 'ESCALATION_FAILED'
  | 'ESCALATION_TIMEOUT'
  | 'ESCALATION_MALFORMED_RESPONSE'
  | 'ESCALATION_CIRCUIT_OPEN'

  // Configuration errors
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

const VALID_CATEGORIES = new Set<string>([
  'VALIDATION_ERROR',
  'LEXICON_ERROR',
  'ESCALATION_FAILED',
  'ESCALATION_TIMEOUT',
  'ESCALATION_MALFORMED_RESPONSE',
  'ESCALATION_CIRCUIT_OPEN',
  'CONFIGURATION_ERROR',
  'INTERNAL_ERROR',
]);

function isErrorCategory(value: unknown): value is ErrorCategory {
  return typeof value === 'string' && VALID_CATEGORIES.has(value);
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR NAME TO CATEGORY MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Map custom error class names to categories.
 * EscalationError carries its own `.category` and is handled in fromUnknown().
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  ZodError: 'VALIDATION_ERROR',
  EscalationError: 'ESCALATION_FAILED',
  CircuitBreakerOpenError: 'ESCALATION_CIRCUIT_OPEN',
  AbortError: 'ESCALATION_TIMEOUT',
};

// ═══════════════════════════════════════════════════════════════════════════════
// RESOLVER ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ResolverError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ResolverError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ResolverError);
    }
  }

  /**
   * Create error from unknown caught value. Always produces a typed error.
   */
  static fromUnknown(
    error: unknown,
    defaultCategory: ErrorCategory = 'INTERNAL_ERROR'
  ): ResolverError {
    if (error instanceof ResolverError) {
      return error;
    }

    if (error instanceof Error) {
      const ownCategory = 'category' in error ? error.category : undefined;
      const category = isErrorCategory(ownCategory)
        ? ownCategory
        : (ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory);

      return new ResolverError(category, error.message, {
        originalName: error.name,
        stack: error.stack,
      });
    }

    return new ResolverError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Suggested next tool and a human-readable hint for each category.
 */
export interface RecoveryHint {
  tool: string;
  hint: string;
}

const RECOVERY_HINTS: Record<ErrorCategory, RecoveryHint> = {
  VALIDATION_ERROR: {
    tool: 'fvr_lexicon_info',
    hint: 'Check parameter types: fields need field_id, table_id and a contents array',
  },
  LEXICON_ERROR: {
    tool: 'fvr_lexicon_info',
    hint: 'Check data/spanish-numbers.json: lowercase a-z words, integer values 0-999',
  },
  ESCALATION_FAILED: {
    tool: 'fvr_resolve_document',
    hint: 'Check FVR_VALIDATOR_URL and the validator service; rerun to retry escalated fields',
  },
  ESCALATION_TIMEOUT: {
    tool: 'fvr_resolve_document',
    hint: 'Raise FVR_VALIDATOR_TIMEOUT_MS or timeout_ms, or submit fewer fields',
  },
  ESCALATION_MALFORMED_RESPONSE: {
    tool: 'fvr_resolve_document',
    hint: 'Validator must answer { results: [{ fieldId, tableId, value, confidenceLabel, rationale }] }',
  },
  ESCALATION_CIRCUIT_OPEN: {
    tool: 'fvr_resolve_document',
    hint: 'Validator failed repeatedly; wait for the circuit breaker recovery window',
  },
  CONFIGURATION_ERROR: {
    tool: 'fvr_lexicon_info',
    hint: 'Check environment variables: FVR_VALIDATOR_URL, FVR_VALIDATOR_TIMEOUT_MS, FVR_ACCEPTANCE_THRESHOLD',
  },
  INTERNAL_ERROR: { tool: 'fvr_lexicon_info', hint: 'Run fvr_lexicon_info to check the server state' },
};

export function getRecoveryHint(category: ErrorCategory): RecoveryHint {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR RESPONSE FORMATTING
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Format ResolverError for tool response
 */
export function formatErrorResponse(error: ResolverError): {
  success: false;
  error: {
    category: ErrorCategory;
    message: string;
    recovery: RecoveryHint;
    details?: Record<string, unknown>;
  };
} {
  return {
    success: false,
    error: {
      category: error.category,
      message: error.message,
      recovery: RECOVERY_HINTS[error.category],
      details: error.details,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Create configuration error for invalid environment variables
 */
export function configurationError(
  message: string,
  details?: Record<string, unknown>
): ResolverError {
  return new ResolverError('CONFIGURATION_ERROR', message, details);
}
