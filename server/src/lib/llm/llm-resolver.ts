/**
 * LLM Resolver
 *
 * Resolves the model and timeout for a given LLM purpose.
 * Applies per-purpose overrides or falls back to defaults.
 */

import type { LLMPurpose } from './llm-purpose.js';
import { getLLMConfig, getDefaultTimeoutForPurpose } from './llm-config.js';
import { logger } from '../logger/structured-logger.js';

export interface ResolvedLLM {
  model: string;
  timeoutMs: number;
}

/**
 * Resolution order:
 * 1. Per-purpose override (e.g., ROUTING_MODEL, ROUTING_TIMEOUT_MS)
 * 2. Global default (LLM_DEFAULT_MODEL, LLM_DEFAULT_TIMEOUT_MS)
 * 3. Hardcoded defaults (gpt-4o-mini, purpose-specific timeouts)
 *
 * @throws Error if configuration is invalid (empty model or non-positive timeout)
 */
export function resolveLLM(purpose: LLMPurpose): ResolvedLLM {
  const config = getLLMConfig();

  const model = config.perPurposeModel[purpose] || config.defaultModel;
  const timeoutMs =
    config.perPurposeTimeoutMs[purpose] ||
    config.defaultTimeoutMs ||
    getDefaultTimeoutForPurpose(purpose);

  validateLLMConfig(purpose, model, timeoutMs);

  return { model, timeoutMs };
}

function validateLLMConfig(purpose: LLMPurpose, model: string, timeoutMs: number): void {
  if (!model || model.trim().length === 0) {
    throw new Error(
      `Invalid LLM configuration for purpose '${purpose}': model is empty. ` +
      `Set LLM_DEFAULT_MODEL or ${purpose.toUpperCase()}_MODEL environment variable.`
    );
  }

  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new Error(
      `Invalid LLM configuration for purpose '${purpose}': timeout must be positive, got ${timeoutMs}ms. ` +
      `Check ${purpose.toUpperCase()}_TIMEOUT_MS or LLM_DEFAULT_TIMEOUT_MS environment variable.`
    );
  }

  if (timeoutMs < 500) {
    logger.warn({ purpose, timeoutMs }, '[LLM Resolver] Timeout is very low; calls may frequently time out');
  }
}
