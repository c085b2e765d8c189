/**
 * LLM Resolver Unit Tests
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { resolveLLM } from './llm-resolver.js';
import { clearLLMConfigCache } from './llm-config.js';

const ENV_KEYS = [
  'LLM_DEFAULT_MODEL',
  'OPENAI_MODEL',
  'LLM_DEFAULT_TIMEOUT_MS',
  'ROUTING_MODEL',
  'ROUTING_TIMEOUT_MS',
  'CLASSIFY_MODEL',
  'CLASSIFY_TIMEOUT_MS',
  'SUGGEST_MODEL',
  'SUGGEST_TIMEOUT_MS'
] as const;

describe('LLM Resolver', () => {
  let saved: Record<string, string | undefined>;

  beforeEach(() => {
    saved = {};
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
    clearLLMConfigCache();
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) delete process.env[key];
      else process.env[key] = value;
    }
    clearLLMConfigCache();
  });

  it('falls back to gpt-4o-mini and purpose timeouts', () => {
    assert.deepEqual(resolveLLM('routing'), { model: 'gpt-4o-mini', timeoutMs: 6000 });
    assert.deepEqual(resolveLLM('classify'), { model: 'gpt-4o-mini', timeoutMs: 6000 });
    assert.deepEqual(resolveLLM('suggest'), { model: 'gpt-4o-mini', timeoutMs: 20000 });
  });

  it('uses OPENAI_MODEL when no default model is set', () => {
    process.env.OPENAI_MODEL = 'gpt-4.1-mini';
    clearLLMConfigCache();

    assert.equal(resolveLLM('suggest').model, 'gpt-4.1-mini');
  });

  it('prefers per-purpose overrides over global defaults', () => {
    process.env.LLM_DEFAULT_MODEL = 'gpt-4o-mini';
    process.env.LLM_DEFAULT_TIMEOUT_MS = '4000';
    process.env.SUGGEST_MODEL = 'gpt-4o';
    process.env.SUGGEST_TIMEOUT_MS = '30000';
    clearLLMConfigCache();

    assert.deepEqual(resolveLLM('suggest'), { model: 'gpt-4o', timeoutMs: 30000 });
    assert.deepEqual(resolveLLM('routing'), { model: 'gpt-4o-mini', timeoutMs: 4000 });
  });

  it('ignores non-numeric timeout overrides', () => {
    process.env.CLASSIFY_TIMEOUT_MS = 'soon';
    clearLLMConfigCache();

    assert.equal(resolveLLM('classify').timeoutMs, 6000);
  });

  it('caches configuration until the cache is cleared', () => {
    process.env.ROUTING_MODEL = 'model-a';
    clearLLMConfigCache();
    assert.equal(resolveLLM('routing').model, 'model-a');

    process.env.ROUTING_MODEL = 'model-b';
    assert.equal(resolveLLM('routing').model, 'model-a');

    clearLLMConfigCache();
    assert.equal(resolveLLM('routing').model, 'model-b');
  });
});
