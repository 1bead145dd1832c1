/**
 * Plain-text export of resolved values, plus a per-field diagnostic
 * report of what was decided and why.
 *
 * @module services/resolution/export
 */

import type { DocumentResolution, ResolutionResult } from '../../models/resolution.js';

export function tableHeader(tableId: number): string {
  return `--- DATOS EXTRAÍDOS TABLA ${tableId} ---`;
}

/**
 * One "<fieldId> : <value>" line per result with a value.
 * Results without a value are left out.
 */
export function formatTableLines(results: readonly ResolutionResult[]): string {
  return results
    .filter((r) => r.value !== null && r.fieldId.trim() !== '')
    .map((r) => `${r.fieldId.trim()} : ${r.value}`)
    .join('\n');
}

/**
 * Render a whole document. Tables with no resolved value are skipped;
 * an empty string means nothing was resolved.
 */
export function formatDocument(resolution: Pick<DocumentResolution, 'tables'>): string {
  const sections: string[] = [];
  for (const table of resolution.tables) {
    const lines = formatTableLines(table.results);
    if (lines) sections.push(`${tableHeader(table.tableId)}\n${lines}`);
  }
  return sections.join('\n\n');
}

// ═══════════════════════════════════════════════════════════════════════════════
// DIAGNOSTIC REPORT
// ═══════════════════════════════════════════════════════════════════════════════

const RULE = '═'.repeat(50);

function decisionTag(result: ResolutionResult): string {
  return result.origin === 'external'
    ? `external ${result.confidenceLabel}`
    : `${result.method} ${result.confidence.toFixed(2)}`;
}

/**
 * What was decided for every field, unresolved ones included:
 *
 *   votos_a  [exact_match 1.00] 35
 *       Text 'Treinta y Cinco' = 35, digits '035' = 35. They agree.
 */
export function formatDiagnostics(resolution: Pick<DocumentResolution, 'tables'>): string {
  return resolution.tables
    .map((table) => {
      const lines = [RULE, ` TABLA ${table.tableId}`, RULE];
      if (table.results.length === 0) lines.push('  (Sin datos)');
      for (const result of table.results) {
        lines.push(`  ${result.fieldId}  [${decisionTag(result)}] ${result.value ?? 'NULO'}`);
        if (result.rationale) lines.push(`      ${result.rationale}`);
      }
      return lines.join('\n');
    })
    .join('\n\n');
}
