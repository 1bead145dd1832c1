/**
 * Circuit Breaker for the external batch validator
 *
 * Defaults: open after 5 transient failures, try again after 60s,
 * close after 2 successes in HALF_OPEN. Each consecutive trip doubles
 * the recovery window (capped at 16x).
 *
 * Only transient failures (HTTP 429/5xx, network errors, attempt
 * timeouts) count. A 4xx or a malformed answer is the caller's
 * problem and leaves the breaker alone.
 *
 * @module services/validator/circuit-breaker
 */

import { CircuitBreakerOpenError, EscalationError } from './errors.js';

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

const NETWORK_ERROR = /ECONNRESET|ETIMEDOUT|ENOTFOUND|ECONNREFUSED|EAI_AGAIN|socket hang up|fetch failed/i;

const MAX_RECOVERY_MULTIPLIER = 16;

function causeText(cause: unknown): string {
  if (!(cause instanceof Error)) return '';
  const code = 'code' in cause && typeof cause.code === 'string' ? cause.code : '';
  return `${cause.message} ${code}`;
}

/**
 * Whether an error is a transient, server-side failure
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof EscalationError) return error.retryable;
  if (!(error instanceof Error)) return false;
  return NETWORK_ERROR.test(`${error.message} ${causeText(error.cause)}`);
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeMs: number;
  halfOpenSuccessThreshold: number;
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeMs: 60_000,
  halfOpenSuccessThreshold: 2,
};

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  consecutiveTrips: number;
  lastFailureTime: number | null;
  timeToRecovery: number | null;
}

export class CircuitBreaker {
  private state: CircuitState = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private consecutiveTrips = 0;
  private lastFailureTime: number | null = null;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Recovery window for the current trip: base * 2^(trips - 1), capped
   */
  getRecoveryTimeMs(): number {
    const exponent = Math.max(0, this.consecutiveTrips - 1);
    const multiplier = Math.min(Math.pow(2, exponent), MAX_RECOVERY_MULTIPLIER);
    return this.config.recoveryTimeMs * multiplier;
  }

  /**
   * Run `fn` unless the circuit is open
   *
   * @throws CircuitBreakerOpenError while OPEN
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    this.checkRecovery();

    if (this.state === CircuitState.OPEN) {
      const timeToRecovery = this.getTimeToRecovery();
      throw new CircuitBreakerOpenError(
        `Validator circuit breaker is OPEN. Try again in ${Math.ceil(timeToRecovery / 1000)}s`,
        timeToRecovery
      );
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      if (isTransientError(error)) {
        this.recordFailure();
      }
      throw error;
    }
  }

  private transition(to: CircuitState, reason: string): void {
    console.error(`[CircuitBreaker] ${this.state} -> ${to}: ${reason}`);
    this.state = to;
  }

  private checkRecovery(): void {
    if (this.state !== CircuitState.OPEN || this.lastFailureTime === null) return;
    if (Date.now() - this.lastFailureTime >= this.getRecoveryTimeMs()) {
      this.transition(CircuitState.HALF_OPEN, `recovery window elapsed (trip #${this.consecutiveTrips})`);
      this.successCount = 0;
    }
  }

  private recordSuccess(): void {
    if (this.state === CircuitState.HALF_OPEN) {
      this.successCount++;
      if (this.successCount >= this.config.halfOpenSuccessThreshold) {
        this.transition(CircuitState.CLOSED, 'recovery confirmed');
        this.failureCount = 0;
        this.successCount = 0;
        this.consecutiveTrips = 0;
        this.lastFailureTime = null;
      }
    } else {
      this.failureCount = 0;
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();
    console.error(
      `[CircuitBreaker] Failure recorded (${this.failureCount}/${this.config.failureThreshold})`
    );

    if (this.state === CircuitState.HALF_OPEN || this.failureCount >= this.config.failureThreshold) {
      this.consecutiveTrips++;
      this.successCount = 0;
      this.transition(
        CircuitState.OPEN,
        `trip #${this.consecutiveTrips}, recovery in ${this.getRecoveryTimeMs()}ms`
      );
    }
  }

  private getTimeToRecovery(): number {
    if (this.lastFailureTime === null) return 0;
    return Math.max(0, this.getRecoveryTimeMs() - (Date.now() - this.lastFailureTime));
  }

  getState(): CircuitState {
    this.checkRecovery();
    return this.state;
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      consecutiveTrips: this.consecutiveTrips,
      lastFailureTime: this.lastFailureTime,
      timeToRecovery: this.state === CircuitState.OPEN ? this.getTimeToRecovery() : null,
    };
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.consecutiveTrips = 0;
    this.lastFailureTime = null;
  }
}
