/**
 * Resolver configuration
 *
 * Environment variables:
 *   FVR_VALIDATOR_URL            - batch validator endpoint; unset disables escalation
 *   FVR_VALIDATOR_API_KEY        - sent as "Authorization: Bearer <key>"
 *   FVR_VALIDATOR_TIMEOUT_MS     - upper bound for one document's escalation (default: 60000)
 *   FVR_VALIDATOR_MAX_ATTEMPTS   - HTTP attempts per escalation (default: 3)
 *   FVR_ACCEPTANCE_THRESHOLD     - minimum local confidence (default: 0.75)
 */

import { z } from 'zod';
import { configurationError } from '../../server/errors.js';
import { describeIssues } from '../../utils/validation.js';

export const ResolverConfigSchema = z.object({
  validatorUrl: z.string().url('FVR_VALIDATOR_URL must be an absolute URL').optional(),
  apiKey: z.string().min(1).optional(),

  // Whole escalation, all retries included
  escalationTimeoutMs: z.number().int().min(100).default(60_000),
  // Single HTTP attempt
  requestTimeoutMs: z.number().int().min(100).default(30_000),

  acceptanceThreshold: z.number().min(0).max(1).default(0.75),

  retry: z
    .object({
      maxAttempts: z.number().int().min(1).default(3),
      baseDelayMs: z.number().int().min(0).default(500),
      maxDelayMs: z.number().int().min(0).default(5000),
    })
    .default({}),

  circuitBreaker: z
    .object({
      failureThreshold: z.number().int().min(1).default(5),
      recoveryTimeMs: z.number().int().min(0).default(60_000),
    })
    .default({}),
});

export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;

function parseIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw configurationError(`Invalid integer env var ${name}: "${raw}"`, { variable: name });
  }
  return parsed;
}

function parseFloatEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw configurationError(`Invalid numeric env var ${name}: "${raw}"`, { variable: name });
  }
  return parsed;
}

function optionalEnv(name: string): string | undefined {
  const raw = process.env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Load configuration from environment variables; `overrides` win.
 *
 * @throws ResolverError (CONFIGURATION_ERROR) on invalid values
 */
export function loadResolverConfig(overrides?: Partial<ResolverConfig>): ResolverConfig {
  const maxAttempts = parseIntEnv('FVR_VALIDATOR_MAX_ATTEMPTS');

  const envConfig = {
    validatorUrl: optionalEnv('FVR_VALIDATOR_URL'),
    apiKey: optionalEnv('FVR_VALIDATOR_API_KEY'),
    escalationTimeoutMs: parseIntEnv('FVR_VALIDATOR_TIMEOUT_MS'),
    acceptanceThreshold: parseFloatEnv('FVR_ACCEPTANCE_THRESHOLD'),
    retry: maxAttempts !== undefined ? { maxAttempts } : undefined,
  };

  const result = ResolverConfigSchema.safeParse({ ...envConfig, ...overrides });
  if (!result.success) {
    throw configurationError(`Invalid resolver configuration: ${describeIssues(result.error)}`);
  }
  return result.data;
}
