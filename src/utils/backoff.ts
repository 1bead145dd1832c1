/**
 * Exponential Backoff with Jitter
 *
 * Base delay doubles each attempt (500ms, 1s, 2s, ... capped at maxDelayMs).
 * Jitter adds +/-25% randomness so clients retrying together spread out.
 * Sleeps are cut short when the caller's AbortSignal fires.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 5000) */
  maxDelayMs: number;
  /** Total attempts including the first one (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25) */
  jitterFraction: number;
}

export interface RetryOptions extends Partial<BackoffConfig> {
  /** Stops retrying and interrupts the current sleep */
  signal?: AbortSignal;
  /** Log prefix, e.g. "BatchValidator" */
  label?: string;
}

export const DEFAULT_BACKOFF: Readonly<BackoffConfig> = Object.freeze({
  baseDelayMs: 500,
  maxDelayMs: 5000,
  maxAttempts: 3,
  jitterFraction: 0.25,
});

/**
 * Delay for a zero-indexed attempt: min(base * 2^attempt, max) +/- jitter
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);
  const jitter = (Math.random() * 2 - 1) * cappedDelay * cfg.jitterFraction;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Error raised when a signal interrupts a retry loop
 */
export function abortError(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Wait `delayMs`, rejecting early when the signal aborts
 */
export function sleep(delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(abortError(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, delayMs);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute `fn` with retries on errors accepted by `shouldRetry`.
 * Non-retryable errors and aborts are re-thrown immediately.
 *
 * @throws The last error once every attempt has failed
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  options: RetryOptions = {}
): Promise<T> {
  const { signal, label = 'Backoff', ...config } = options;
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    if (signal?.aborted) throw abortError(signal);
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (signal?.aborted || !shouldRetry(error)) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        const delay = calculateBackoffDelay(attempt, cfg);
        const reason = error instanceof Error ? error.message : String(error);
        console.error(
          `[${label}] Attempt ${attempt + 1}/${cfg.maxAttempts} failed: ${reason}. Retrying in ${delay}ms`
        );
        await sleep(delay, signal);
      }
    }
  }

  throw lastError;
}
