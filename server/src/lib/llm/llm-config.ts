/**
 * LLM Configuration
 *
 * Models and timeouts per purpose, read from environment variables.
 *
 * Environment variables:
 * - LLM_DEFAULT_MODEL (falls back to OPENAI_MODEL, then gpt-4o-mini)
 * - ROUTING_MODEL, CLASSIFY_MODEL, SUGGEST_MODEL (optional overrides)
 * - LLM_DEFAULT_TIMEOUT_MS
 * - ROUTING_TIMEOUT_MS, CLASSIFY_TIMEOUT_MS, SUGGEST_TIMEOUT_MS (optional overrides)
 */

import { LLM_PURPOSES, type LLMPurpose } from './llm-purpose.js';

export interface LLMConfig {
  defaultModel: string;
  perPurposeModel: Partial<Record<LLMPurpose, string>>;
  defaultTimeoutMs: number;
  perPurposeTimeoutMs: Partial<Record<LLMPurpose, number>>;
}

/**
 * Default timeout values per purpose (used when no env override)
 */
const DEFAULT_TIMEOUTS: Record<LLMPurpose, number> = {
  routing: 6000,
  classify: 6000,
  suggest: 20000   // Long structured list with descriptions
};

function readNonEmpty(name: string): string | undefined {
  const value = process.env[name]?.trim();
  return value ? value : undefined;
}

function readPositiveInt(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const parsed = parseInt(raw, 10);
  return !isNaN(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Load LLM configuration from environment variables
 */
export function loadLLMConfig(): LLMConfig {
  const defaultModel = readNonEmpty('LLM_DEFAULT_MODEL') ?? readNonEmpty('OPENAI_MODEL') ?? 'gpt-4o-mini';

  const perPurposeModel: Partial<Record<LLMPurpose, string>> = {};
  const perPurposeTimeoutMs: Partial<Record<LLMPurpose, number>> = {};

  for (const purpose of LLM_PURPOSES) {
    const prefix = purpose.toUpperCase();
    const model = readNonEmpty(`${prefix}_MODEL`);
    if (model) perPurposeModel[purpose] = model;
    const timeout = readPositiveInt(`${prefix}_TIMEOUT_MS`);
    if (timeout !== undefined) perPurposeTimeoutMs[purpose] = timeout;
  }

  return {
    defaultModel,
    perPurposeModel,
    defaultTimeoutMs: readPositiveInt('LLM_DEFAULT_TIMEOUT_MS') ?? 0,
    perPurposeTimeoutMs
  };
}

/**
 * Get default timeout for a purpose (used when no env override)
 */
export function getDefaultTimeoutForPurpose(purpose: LLMPurpose): number {
  return DEFAULT_TIMEOUTS[purpose];
}

let cachedConfig: LLMConfig | null = null;

/**
 * Get cached LLM configuration (loads once, reuses on subsequent calls)
 */
export function getLLMConfig(): LLMConfig {
  if (!cachedConfig) {
    cachedConfig = loadLLMConfig();
  }
  return cachedConfig;
}

/**
 * Clear cache (for testing purposes)
 */
export function clearLLMConfigCache(): void {
  cachedConfig = null;
}
