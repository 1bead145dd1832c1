/**
 * Startup Validation
 *
 * Loads the lexicon and configuration before the transport connects so a
 * broken data file or environment fails at startup, not on the first call.
 *
 * CRITICAL: NEVER use console.log() - stdout may be reserved for JSON-RPC protocol.
 *
 * @module server/startup
 */

import { getDefaultLexicon } from '../services/lexicon/lexicon.js';
import { getConfig } from './state.js';

/**
 * @throws ResolverError (LEXICON_ERROR or CONFIGURATION_ERROR)
 */
export function validateStartupDependencies(): void {
  getDefaultLexicon();
  const config = getConfig();

  const warnings: string[] = [];
  if (!config.validatorUrl) {
    warnings.push(
      'FVR_VALIDATOR_URL is not set. Low-confidence fields will be returned as unresolved.'
    );
  } else if (!config.apiKey) {
    warnings.push('FVR_VALIDATOR_API_KEY is not set. Requests go out without Authorization.');
  }

  if (warnings.length > 0) {
    console.error('=== STARTUP WARNINGS ===');
    for (const w of warnings) {
      console.error(`  - ${w}`);
    }
    console.error('========================');
  }

  console.error(
    `[Config] acceptance threshold=${config.acceptanceThreshold}, ` +
      `escalation timeout=${config.escalationTimeoutMs}ms, ` +
      `validator=${config.validatorUrl ?? 'none'}`
  );
}
