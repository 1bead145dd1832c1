/**
 * Escalation collector - gathers the fields a document could not resolve
 * locally and sends them to the external validator in one call.
 *
 * The collector is single-use: flush() may run once. This keeps the
 * "one external call per document, never per field" contract explicit.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/resolution/escalation
 */

import type { RawFieldCandidate } from '../../models/field.js';
import type { BatchValidator, EscalationBatch, ExternalAnswers } from '../../models/resolution.js';
import { ResolverError } from '../../server/errors.js';
import { ExternalAnswersSchema, describeIssues } from '../../utils/validation.js';

export const DEFAULT_ESCALATION_TIMEOUT_MS = 60_000;

export type FlushOutcome =
  | { status: 'not_needed' }
  | { status: 'skipped' }
  | { status: 'resolved'; answers: ExternalAnswers }
  | { status: 'failed' | 'aborted'; error: ResolverError };

export interface FlushOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export class EscalationCollector {
  private readonly batch: EscalationBatch = new Map();
  private flushed = false;

  add(candidate: RawFieldCandidate): void {
    if (this.flushed) {
      throw new ResolverError('INTERNAL_ERROR', 'Escalation batch already flushed', {
        fieldId: candidate.fieldId,
      });
    }
    const fields = this.batch.get(candidate.tableId);
    if (fields) {
      fields.push(candidate);
    } else {
      this.batch.set(candidate.tableId, [candidate]);
    }
  }

  get size(): number {
    let count = 0;
    for (const fields of this.batch.values()) count += fields.length;
    return count;
  }

  /** Read-only view of the pending batch */
  peek(): ReadonlyMap<number, readonly RawFieldCandidate[]> {
    return this.batch;
  }

  /**
   * Send the batch to the validator. Never throws for validator failures:
   * errors, timeouts, aborts and malformed answers come back as outcomes.
   */
  async flush(validator: BatchValidator | null, options: FlushOptions = {}): Promise<FlushOutcome> {
    if (this.flushed) {
      throw new ResolverError('INTERNAL_ERROR', 'Escalation batch already flushed');
    }
    this.flushed = true;

    if (this.size === 0) return { status: 'not_needed' };
    if (validator === null) return { status: 'skipped' };

    const timeoutMs = options.timeoutMs ?? DEFAULT_ESCALATION_TIMEOUT_MS;
    const controller = new AbortController();
    let callerAborted = false;

    let rejectOnAbort: (reason: ResolverError) => void = () => undefined;
    const aborted = new Promise<never>((_, reject) => {
      rejectOnAbort = reject;
    });

    const onCallerAbort = (): void => {
      callerAborted = true;
      controller.abort();
      rejectOnAbort(new ResolverError('ESCALATION_TIMEOUT', 'Escalation aborted by caller'));
    };
    const timer = setTimeout(() => {
      controller.abort();
      rejectOnAbort(
        new ResolverError('ESCALATION_TIMEOUT', `Escalation timed out after ${timeoutMs}ms`, {
          timeoutMs,
        })
      );
    }, timeoutMs);

    if (options.signal?.aborted) {
      onCallerAbort();
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    console.error(
      `[Escalation] Sending ${this.size} field(s) from ${this.batch.size} table(s) to validator`
    );

    try {
      const answers = await Promise.race([
        validator.validateBatch(this.batch, { signal: controller.signal }),
        aborted,
      ]);
      const parsed = ExternalAnswersSchema.safeParse(answers);
      if (!parsed.success) {
        const error = new ResolverError(
          'ESCALATION_MALFORMED_RESPONSE',
          `Validator returned a malformed response: ${describeIssues(parsed.error)}`
        );
        console.error(`[Escalation] ${error.message}`);
        return { status: 'failed', error };
      }
      return { status: 'resolved', answers: parsed.data };
    } catch (error) {
      const resolverError = ResolverError.fromUnknown(error, 'ESCALATION_FAILED');
      const status = callerAborted ? 'aborted' : 'failed';
      console.error(`[Escalation] ${status}: ${resolverError.category}: ${resolverError.message}`);
      return { status, error: resolverError };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCallerAbort);
    }
  }
}
