/**
 * Batch Resolution Pipeline
 *
 * Resolves every field of a document:
 *   1. classify evidence and arbitrate each field locally
 *   2. accept fields with a letter-derived value and confidence >= threshold
 *   3. send all other fields to the validator in ONE batched call
 *   4. merge local and external answers back in original per-table order
 *
 * A failing validator never fails the document: escalated fields come
 * back as `unresolved` and the result is flagged partial.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/resolution/pipeline
 */

import type { Evidence, RawFieldCandidate } from '../../models/field.js';
import type {
  BatchValidator,
  ConfidenceLabel,
  DocumentResolution,
  ExternalAnswers,
  ExternalFieldAnswer,
  ExternalResolution,
  LocalDecision,
  LocalResolution,
  ResolutionResult,
  TableResolution,
} from '../../models/resolution.js';
import { getDefaultLexicon, type Lexicon } from '../lexicon/lexicon.js';
import { arbitrate } from './arbitrator.js';
import { classifyEvidence } from './evidence.js';
import { EscalationCollector, type FlushOutcome } from './escalation.js';

export const DEFAULT_ACCEPTANCE_THRESHOLD = 0.75;

/** Float confidence given to a field answered by the external validator */
export const LABEL_CONFIDENCE: Readonly<Record<ConfidenceLabel, number>> = Object.freeze({
  alta: 0.9,
  media: 0.6,
  baja: 0.3,
});

export interface ResolveOptions {
  acceptanceThreshold?: number;
  /** Upper bound for the single validator call */
  timeoutMs?: number;
  /** Aborting returns the locally accepted results at once */
  signal?: AbortSignal;
  lexicon?: Lexicon;
}

export interface FieldResolution {
  candidate: RawFieldCandidate;
  evidence: Evidence;
  result: LocalResolution;
}

/**
 * Classify and arbitrate a single field
 */
export function resolveField(
  candidate: RawFieldCandidate,
  lexicon: Lexicon = getDefaultLexicon()
): FieldResolution {
  const evidence = classifyEvidence(candidate.contents);
  const decision = arbitrate(evidence.letterText, evidence.digitText, lexicon);
  return {
    candidate,
    evidence,
    result: {
      ...decision,
      fieldId: candidate.fieldId,
      tableId: candidate.tableId,
      origin: 'local',
    },
  };
}

export function isLocallyAccepted(result: LocalDecision, threshold: number): boolean {
  if (result.method === 'needs_escalation' || result.method === 'unresolved') return false;
  return result.confidence >= threshold;
}

function externalResolution(tableId: number, answer: ExternalFieldAnswer): ExternalResolution {
  return {
    fieldId: answer.fieldId,
    tableId,
    method: 'external',
    origin: 'external',
    value: answer.value,
    confidence: answer.value === null ? 0 : LABEL_CONFIDENCE[answer.confidenceLabel],
    confidenceLabel: answer.confidenceLabel,
    rationale: answer.rationale,
  };
}

function unresolvedPlaceholder(field: FieldResolution, reason: string): LocalResolution {
  return {
    fieldId: field.candidate.fieldId,
    tableId: field.candidate.tableId,
    method: 'unresolved',
    origin: 'local',
    value: null,
    confidence: 0,
    rationale: `${field.result.rationale} ${reason}`,
  };
}

function missingAnswerReason(outcome: FlushOutcome): string {
  switch (outcome.status) {
    case 'skipped':
      return 'Escalation skipped: no validator configured.';
    case 'failed':
      return `Escalation failed: ${outcome.error.message}`;
    case 'aborted':
      return 'Escalation aborted before the validator answered.';
    case 'resolved':
    case 'not_needed':
      return 'Validator returned no answer for this field.';
  }
}

/** First answer per field id wins */
function indexAnswers(answers: readonly ExternalFieldAnswer[]): Map<string, ExternalFieldAnswer> {
  const byField = new Map<string, ExternalFieldAnswer>();
  for (const answer of answers) {
    if (!byField.has(answer.fieldId)) byField.set(answer.fieldId, answer);
  }
  return byField;
}

/**
 * Merge local and external results per table, in candidate order.
 * External answers for unknown fields are appended after a table's
 * fields; answers for unknown tables become trailing tables.
 */
export function mergeResults(
  fields: readonly FieldResolution[],
  accepted: ReadonlySet<FieldResolution>,
  outcome: FlushOutcome
): { tables: TableResolution[]; answeredFields: number } {
  const answers: ExternalAnswers = outcome.status === 'resolved' ? outcome.answers : new Map();

  const byTable = new Map<number, FieldResolution[]>();
  for (const field of fields) {
    const list = byTable.get(field.candidate.tableId);
    if (list) {
      list.push(field);
    } else {
      byTable.set(field.candidate.tableId, [field]);
    }
  }

  const tables: TableResolution[] = [];
  let answeredFields = 0;
  const reason = missingAnswerReason(outcome);

  for (const [tableId, tableFields] of byTable) {
    const external = indexAnswers(answers.get(tableId) ?? []);
    const known = new Set<string>();
    const results: ResolutionResult[] = [];

    for (const field of tableFields) {
      known.add(field.candidate.fieldId);
      if (accepted.has(field)) {
        results.push(field.result);
        continue;
      }
      const answer = external.get(field.candidate.fieldId);
      if (answer) {
        results.push(externalResolution(tableId, answer));
        answeredFields++;
      } else {
        results.push(unresolvedPlaceholder(field, reason));
      }
    }

    for (const [fieldId, answer] of external) {
      if (!known.has(fieldId)) results.push(externalResolution(tableId, answer));
    }
    tables.push({ tableId, results });
  }

  for (const [tableId, tableAnswers] of answers) {
    if (byTable.has(tableId)) continue;
    const results = [...indexAnswers(tableAnswers).values()].map((a) => externalResolution(tableId, a));
    if (results.length > 0) tables.push({ tableId, results });
  }

  return { tables, answeredFields };
}

/**
 * Resolve all fields of one document.
 *
 * @param candidates - raw fields, any table order; per-table order is kept
 * @param escalate - external validator, or null when none is configured
 */
export async function resolveDocument(
  candidates: readonly RawFieldCandidate[],
  escalate: BatchValidator | null,
  options: ResolveOptions = {}
): Promise<DocumentResolution> {
  const threshold = options.acceptanceThreshold ?? DEFAULT_ACCEPTANCE_THRESHOLD;
  const lexicon = options.lexicon ?? getDefaultLexicon();

  const fields = candidates.map((candidate) => resolveField(candidate, lexicon));
  const accepted = new Set<FieldResolution>();
  const collector = new EscalationCollector();

  for (const field of fields) {
    if (isLocallyAccepted(field.result, threshold)) {
      accepted.add(field);
    } else {
      collector.add(field.candidate);
    }
  }

  const requestedFields = collector.size;
  const outcome = await collector.flush(escalate, {
    timeoutMs: options.timeoutMs,
    signal: options.signal,
  });

  const { tables, answeredFields } = mergeResults(fields, accepted, outcome);
  const results = tables.flatMap((t) => t.results);

  console.error(
    `[Pipeline] Resolved ${fields.length} field(s): ${accepted.size} local, ` +
      `${requestedFields} escalated (${outcome.status}), ${answeredFields} answered externally`
  );

  return {
    results,
    tables,
    partial: answeredFields < requestedFields,
    escalation: {
      status: outcome.status,
      requestedFields,
      answeredFields,
      ...(outcome.status === 'failed' || outcome.status === 'aborted'
        ? { error: outcome.error.message }
        : {}),
    },
  };
}
