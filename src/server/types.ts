/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

import type { ResolverConfig } from '../services/validator/config.js';
import type { BatchValidator } from '../models/resolution.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerState {
  /** Loaded from the environment on first use */
  config: ResolverConfig | null;

  /** null until first requested, or when no validator URL is configured */
  validator: BatchValidator | null;

  /** Whether `validator` reflects the current config */
  validatorResolved: boolean;
}
