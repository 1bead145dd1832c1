/**
 * HTTP Batch Validator
 *
 * Sends one document's escalation batch to an external arbitration
 * service and groups the answers by table. The service decides how to
 * answer (human review, a model, a rules engine); this client only
 * carries the batch.
 *
 * Request:  POST { tables: [{ tableId, fields: [{ fieldId, contents }] }] }
 * Response: { results: [{ fieldId, tableId, value, confidenceLabel, rationale }] }
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/validator/client
 */

import type { z } from 'zod';
import type {
  BatchValidator,
  EscalationBatch,
  ExternalAnswers,
  ExternalFieldAnswer,
} from '../../models/resolution.js';
import { abortError, withRetry, type BackoffConfig } from '../../utils/backoff.js';
import { ValidatorResponseBody, describeIssues } from '../../utils/validation.js';
import { CircuitBreaker, isTransientError, type CircuitBreakerConfig } from './circuit-breaker.js';
import type { ResolverConfig } from './config.js';
import { EscalationError, isRetryableStatus } from './errors.js';

export interface HttpBatchValidatorOptions {
  url: string;
  apiKey?: string;
  /** Timeout of one HTTP attempt (default: 30000) */
  requestTimeoutMs?: number;
  retry?: Partial<BackoffConfig>;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
}

export interface ValidatorRequestBody {
  tables: Array<{
    tableId: number;
    fields: Array<{ fieldId: string; contents: string[] }>;
  }>;
}

type ValidatorResponse = z.infer<typeof ValidatorResponseBody>;

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export function buildRequestBody(batch: EscalationBatch): ValidatorRequestBody {
  return {
    tables: [...batch].map(([tableId, fields]) => ({
      tableId,
      fields: fields.map((f) => ({ fieldId: f.fieldId, contents: [...f.contents] })),
    })),
  };
}

/**
 * Group answers by table id, keeping response order
 */
export function groupAnswers(results: readonly ExternalFieldAnswer[]): ExternalAnswers {
  const answers: ExternalAnswers = new Map();
  for (const result of results) {
    const list = answers.get(result.tableId);
    if (list) {
      list.push(result);
    } else {
      answers.set(result.tableId, [result]);
    }
  }
  return answers;
}

export class HttpBatchValidator implements BatchValidator {
  private readonly url: string;
  private readonly apiKey?: string;
  private readonly requestTimeoutMs: number;
  private readonly retry: Partial<BackoffConfig>;
  readonly circuitBreaker: CircuitBreaker;

  constructor(options: HttpBatchValidatorOptions) {
    this.url = options.url;
    this.apiKey = options.apiKey;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.retry = options.retry ?? {};
    this.circuitBreaker = new CircuitBreaker(options.circuitBreaker);
  }

  /**
   * Validator for the configured endpoint, or null when none is set
   */
  static fromConfig(config: ResolverConfig): HttpBatchValidator | null {
    if (!config.validatorUrl) return null;
    return new HttpBatchValidator({
      url: config.validatorUrl,
      apiKey: config.apiKey,
      requestTimeoutMs: config.requestTimeoutMs,
      retry: config.retry,
      circuitBreaker: config.circuitBreaker,
    });
  }

  async validateBatch(
    batch: EscalationBatch,
    options: { signal?: AbortSignal } = {}
  ): Promise<ExternalAnswers> {
    const body = JSON.stringify(buildRequestBody(batch));
    const startTime = Date.now();

    const response = await this.circuitBreaker.execute(() =>
      withRetry(() => this.post(body, options.signal), isTransientError, {
        ...this.retry,
        signal: options.signal,
        label: 'BatchValidator',
      })
    );

    console.error(
      `[BatchValidator] ${response.results.length} answer(s) in ${Date.now() - startTime}ms`
    );
    return groupAnswers(response.results);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json',
    };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;
    return headers;
  }

  /**
   * One HTTP attempt
   */
  private async post(body: string, signal?: AbortSignal): Promise<ValidatorResponse> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.requestTimeoutMs);
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let rawResponse: Response;
    try {
      rawResponse = await fetch(this.url, {
        method: 'POST',
        headers: this.headers(),
        body,
        signal: controller.signal,
      });
    } catch (error) {
      if (signal?.aborted) throw abortError(signal);
      if (timedOut) {
        throw new EscalationError(`Validator request timed out after ${this.requestTimeoutMs}ms`, {
          category: 'ESCALATION_TIMEOUT',
          retryable: true,
          cause: error,
        });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new EscalationError(`Validator request failed: ${reason}`, { retryable: true, cause: error });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }

    if (!rawResponse.ok) {
      const text = await rawResponse.text().catch(() => '');
      throw new EscalationError(
        `Validator returned HTTP ${rawResponse.status} ${rawResponse.statusText}. ${text.slice(0, 200)}`.trim(),
        { status: rawResponse.status, retryable: isRetryableStatus(rawResponse.status) }
      );
    }

    let data: unknown;
    try {
      data = await rawResponse.json();
    } catch (error) {
      throw new EscalationError('Validator response is not valid JSON', {
        category: 'ESCALATION_MALFORMED_RESPONSE',
        status: rawResponse.status,
        cause: error,
      });
    }

    const parsed = ValidatorResponseBody.safeParse(data);
    if (!parsed.success) {
      throw new EscalationError(`Validator response failed validation: ${describeIssues(parsed.error)}`, {
        category: 'ESCALATION_MALFORMED_RESPONSE',
        status: rawResponse.status,
      });
    }
    return parsed.data;
  }
}
