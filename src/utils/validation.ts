/**
 * Field Value Resolver - Zod Validation Schemas
 *
 * Input validation for MCP tool inputs and for answers coming back from
 * the external batch validator.
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Join zod issues into one message: "path: message; path: message"
 */
export function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failed constraint
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const TableId = z.number().int('table_id must be an integer').min(0);

export const FieldId = z.string().trim().min(1, 'field_id is required').max(64);

export const ConfidenceLabelSchema = z.enum(['alta', 'media', 'baja']);

/**
 * Field value range accepted from the external validator
 */
export const FieldValue = z.number().int().min(0).max(999);

// ═══════════════════════════════════════════════════════════════════════════════
// EXTERNAL VALIDATOR SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ExternalFieldAnswerSchema = z.object({
  fieldId: FieldId,
  tableId: TableId,
  value: FieldValue.nullable(),
  confidenceLabel: ConfidenceLabelSchema,
  rationale: z.string().default(''),
});

export const ExternalAnswersSchema = z.map(TableId, z.array(ExternalFieldAnswerSchema));

/**
 * Wire shape of the HTTP validator's response body
 */
export const ValidatorResponseBody = z.object({
  results: z.array(ExternalFieldAnswerSchema),
});

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const RawFieldInput = z.object({
  field_id: FieldId,
  table_id: TableId,
  contents: z.array(z.string()).describe('Every OCR token of the field, in reading order'),
});

export const ConvertTextInput = z.object({
  text: z.string().max(500).describe('Spelled-out Spanish number, possibly OCR-corrupted'),
});

export const ArbitrateFieldFields = z.object({
  letter_text: z.string().max(500).optional(),
  digit_text: z.string().max(100).optional(),
  contents: z
    .array(z.string())
    .optional()
    .describe('Raw OCR tokens; classified into letter/digit evidence when given'),
});

export const ArbitrateFieldInput = ArbitrateFieldFields.refine(
  (v) => v.contents !== undefined || v.letter_text !== undefined || v.digit_text !== undefined,
  { message: 'Provide contents, or letter_text and/or digit_text' }
);

export const ResolveDocumentInput = z.object({
  fields: z.array(RawFieldInput).min(1, 'At least one field is required').max(2000),
  acceptance_threshold: z.number().min(0).max(1).optional(),
  timeout_ms: z.number().int().min(100).max(600_000).optional(),
  escalate: z
    .boolean()
    .default(true)
    .describe('Send low-confidence fields to the configured validator (FVR_VALIDATOR_URL)'),
  include_diagnostics: z
    .boolean()
    .default(false)
    .describe('Add a per-field report with method, confidence and rationale'),
});

export const LexiconInfoInput = z.object({});
