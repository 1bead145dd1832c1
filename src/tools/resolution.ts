/**
 * Field Value Resolution MCP Tools
 *
 * Tools: fvr_convert_text, fvr_arbitrate_field, fvr_resolve_document, fvr_lexicon_info
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/resolution
 */

import type { Evidence, RawFieldCandidate } from '../models/field.js';
import { getConfig, getValidator } from '../server/state.js';
import { successResult } from '../server/types.js';
import { DEFAULT_LEXICON_PATH, getDefaultLexicon } from '../services/lexicon/lexicon.js';
import { normalize, tokenize } from '../services/lexicon/normalizer.js';
import { arbitrate } from '../services/resolution/arbitrator.js';
import { classifyEvidence } from '../services/resolution/evidence.js';
import { convertExact } from '../services/resolution/exact-resolver.js';
import { formatDiagnostics, formatDocument } from '../services/resolution/export.js';
import { fingerprintCandidates } from '../services/resolution/fingerprint.js';
import { convertFuzzy } from '../services/resolution/fuzzy-resolver.js';
import { isLocallyAccepted, resolveDocument } from '../services/resolution/pipeline.js';
import { HttpBatchValidator } from '../services/validator/client.js';
import {
  ArbitrateFieldFields,
  ArbitrateFieldInput,
  ConvertTextInput,
  LexiconInfoInput,
  ResolveDocumentInput,
  validateInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleConvertText(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConvertTextInput, params);
    const lexicon = getDefaultLexicon();
    const fuzzy = convertFuzzy(input.text, lexicon);

    return formatResponse(
      successResult({
        text: input.text,
        normalized: normalize(input.text),
        tokens: tokenize(input.text),
        exact_value: convertExact(input.text, lexicon),
        fuzzy_value: fuzzy.value,
        fuzzy_confidence: fuzzy.confidence,
        fingerprint_candidates: fingerprintCandidates(input.text, lexicon),
        next_steps: [
          { tool: 'fvr_arbitrate_field', description: 'Combine the text with the digit form' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleArbitrateField(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ArbitrateFieldInput, params);
    const classified: Evidence = input.contents
      ? classifyEvidence(input.contents)
      : { letterText: null, digitText: null };
    // Explicit texts win over what the classifier picked
    const evidence: Evidence = {
      letterText: input.letter_text ?? classified.letterText,
      digitText: input.digit_text ?? classified.digitText,
    };

    const decision = arbitrate(evidence.letterText, evidence.digitText, getDefaultLexicon());
    const threshold = getConfig().acceptanceThreshold;

    return formatResponse(
      successResult({
        evidence: { letter_text: evidence.letterText, digit_text: evidence.digitText },
        ...decision,
        acceptance_threshold: threshold,
        locally_accepted: isLocallyAccepted(decision, threshold),
        next_steps: [
          { tool: 'fvr_resolve_document', description: 'Resolve every field of a document at once' },
        ],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleResolveDocument(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ResolveDocumentInput, params);
    const config = getConfig();

    const candidates: RawFieldCandidate[] = input.fields.map((f) => ({
      fieldId: f.field_id,
      tableId: f.table_id,
      contents: f.contents,
    }));

    const resolution = await resolveDocument(candidates, input.escalate ? getValidator() : null, {
      acceptanceThreshold: input.acceptance_threshold ?? config.acceptanceThreshold,
      timeoutMs: input.timeout_ms ?? config.escalationTimeoutMs,
    });

    const nextSteps = resolution.partial
      ? [{ tool: 'fvr_lexicon_info', description: 'Check validator configuration and circuit state' }]
      : [];

    return formatResponse(
      successResult({
        ...resolution,
        export_text: formatDocument(resolution),
        ...(input.include_diagnostics ? { diagnostics_text: formatDiagnostics(resolution) } : {}),
        next_steps: nextSteps,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleLexiconInfo(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(LexiconInfoInput, params);
    const lexicon = getDefaultLexicon();
    const config = getConfig();
    const validator = getValidator();

    return formatResponse(
      successResult({
        language: lexicon.language,
        lexicon_path: DEFAULT_LEXICON_PATH,
        ...lexicon.info(),
        acceptance_threshold: config.acceptanceThreshold,
        escalation_timeout_ms: config.escalationTimeoutMs,
        validator_configured: validator !== null,
        circuit_breaker:
          validator instanceof HttpBatchValidator ? validator.circuitBreaker.getStatus() : null,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const resolutionTools: Record<string, ToolDefinition> = {
  fvr_convert_text: {
    description:
      '[CONVERT] Convert a spelled-out Spanish number (0-999) to an integer. Returns exact and fuzzy readings plus fingerprint candidates.',
    inputSchema: ConvertTextInput.shape,
    handler: handleConvertText,
  },
  fvr_arbitrate_field: {
    description:
      '[CONVERT] Decide one field value from its letter and digit forms, or from raw OCR tokens. Returns method, value, confidence and rationale.',
    inputSchema: ArbitrateFieldFields.shape,
    handler: handleArbitrateField,
  },
  fvr_resolve_document: {
    description:
      '[RESOLVE] Resolve every field of a document. Low-confidence fields go to the configured validator in one batch; failures degrade to a partial result.',
    inputSchema: ResolveDocumentInput.shape,
    handler: handleResolveDocument,
  },
  fvr_lexicon_info: {
    description:
      '[STATUS] Show lexicon statistics, acceptance threshold and validator / circuit breaker state.',
    inputSchema: LexiconInfoInput.shape,
    handler: handleLexiconInfo,
  },
};
