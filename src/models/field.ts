/**
 * Field candidate models - raw OCR tokens handed over by the extraction step
 */

/**
 * Every OCR-read token of one field's cell(s), in reading order.
 * `fieldId` is assigned upstream and stable across the document.
 */
export interface RawFieldCandidate {
  fieldId: string;
  tableId: number;
  contents: readonly string[];
}

/**
 * Letter-form and digit-form evidence picked out of a candidate's contents.
 * Either side may be missing.
 */
export interface Evidence {
  letterText: string | null;
  digitText: string | null;
}
