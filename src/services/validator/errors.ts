/**
 * Errors raised by the HTTP batch validator
 *
 * @module services/validator/errors
 */

import type { ErrorCategory } from '../../server/errors.js';

/**
 * A failed validator call. `retryable` marks transient failures
 * (5xx, 429, network, per-attempt timeout) that backoff and the
 * circuit breaker act on.
 */
export class EscalationError extends Error {
  readonly category: ErrorCategory;
  readonly status: number | null;
  readonly retryable: boolean;

  constructor(
    message: string,
    options: { category?: ErrorCategory; status?: number | null; retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'EscalationError';
    this.category = options.category ?? 'ESCALATION_FAILED';
    this.status = options.status ?? null;
    this.retryable = options.retryable ?? false;
  }
}

/**
 * Error thrown when the circuit breaker is open
 */
export class CircuitBreakerOpenError extends Error {
  readonly category: ErrorCategory = 'ESCALATION_CIRCUIT_OPEN';
  readonly timeToRecovery: number;

  constructor(message: string, timeToRecovery: number) {
    super(message);
    this.name = 'CircuitBreakerOpenError';
    this.timeToRecovery = timeToRecovery;
  }
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}
