/**
 * MCP Server State Management
 *
 * Holds the resolver configuration and the batch validator shared by all
 * tool calls, so the circuit breaker sees every escalation.
 *
 * @module server/state
 */

import type { BatchValidator } from '../models/resolution.js';
import { HttpBatchValidator } from '../services/validator/client.js';
import { loadResolverConfig, type ResolverConfig } from '../services/validator/config.js';
import type { ServerState } from './types.js';

export const state: ServerState = {
  config: null,
  validator: null,
  validatorResolved: false,
};

/**
 * Current configuration, loaded from the environment on first access
 *
 * @throws ResolverError (CONFIGURATION_ERROR) when the environment is invalid
 */
export function getConfig(): ResolverConfig {
  if (!state.config) {
    state.config = loadResolverConfig();
  }
  return state.config;
}

/**
 * Shared validator, or null when FVR_VALIDATOR_URL is not set
 */
export function getValidator(): BatchValidator | null {
  if (!state.validatorResolved) {
    state.validator = HttpBatchValidator.fromConfig(getConfig());
    state.validatorResolved = true;
  }
  return state.validator;
}

/**
 * Install a validator directly (in-process stand-ins, embedding hosts)
 */
export function setValidator(validator: BatchValidator | null): void {
  state.validator = validator;
  state.validatorResolved = true;
}

export function resetState(): void {
  state.config = null;
  state.validator = null;
  state.validatorResolved = false;
}
