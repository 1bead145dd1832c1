/**
 * Resolution models - per-field decisions, escalation batches and the
 * document-level result returned by the pipeline.
 */

import type { RawFieldCandidate } from './field.js';

/**
 * Categorical confidence returned by the external validator
 */
export type ConfidenceLabel = 'alta' | 'media' | 'baja';

/** Methods that produce a trusted value from the letter form */
export type LetterMethod = 'exact_match' | 'exact_priority' | 'fuzzy_match' | 'fuzzy_priority';

export type ResolutionMethod = LetterMethod | 'needs_escalation' | 'unresolved' | 'external';

export type ResolutionOrigin = 'local' | 'external';

/**
 * Decision taken by the arbitrator for a single field, before ids are attached
 */
export type LocalDecision =
  | { method: LetterMethod; value: number; confidence: number; rationale: string }
  | { method: 'needs_escalation'; value: number; confidence: 0; rationale: string }
  | { method: 'unresolved'; value: null; confidence: 0; rationale: string };

interface FieldRef {
  fieldId: string;
  tableId: number;
}

export type LocalResolution = LocalDecision & FieldRef & { origin: 'local' };

export interface ExternalResolution extends FieldRef {
  method: 'external';
  origin: 'external';
  value: number | null;
  confidence: number;
  confidenceLabel: ConfidenceLabel;
  rationale: string;
}

/**
 * Final per-field result. Exactly one per candidate after the merge.
 */
export type ResolutionResult = LocalResolution | ExternalResolution;

/**
 * Fields that could not be trusted locally, grouped by table in
 * original field order. Built once per document, sent once.
 */
export type EscalationBatch = Map<number, RawFieldCandidate[]>;

/**
 * One answer from the external validator
 */
export interface ExternalFieldAnswer {
  fieldId: string;
  tableId: number;
  value: number | null;
  confidenceLabel: ConfidenceLabel;
  rationale: string;
}

export type ExternalAnswers = Map<number, ExternalFieldAnswer[]>;

/**
 * External arbitration capability. Called at most once per document.
 */
export interface BatchValidator {
  validateBatch(batch: EscalationBatch, options?: { signal?: AbortSignal }): Promise<ExternalAnswers>;
}

export type EscalationStatus = 'not_needed' | 'resolved' | 'failed' | 'aborted' | 'skipped';

export interface EscalationReport {
  status: EscalationStatus;
  requestedFields: number;
  answeredFields: number;
  error?: string;
}

export interface TableResolution {
  tableId: number;
  results: ResolutionResult[];
}

/**
 * Output of resolveDocument(). `partial` is true when some escalated
 * fields were left unresolved because the validator gave no answer.
 */
export interface DocumentResolution {
  results: ResolutionResult[];
  tables: TableResolution[];
  partial: boolean;
  escalation: EscalationReport;
}
