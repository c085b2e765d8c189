import type { LLMProvider } from './types.js';
import { OpenAiProvider } from './openai.provider.js';

let cached: LLMProvider | null | undefined; // undefined = not initialized

export function createLLMProvider(): LLMProvider | null {
    if (cached) return cached;
    if (cached === null) return null;

    const provider = (process.env.LLM_PROVIDER || 'openai').toLowerCase();

    if (provider === 'openai') {
        if (!process.env.OPENAI_API_KEY) return null; // key may be set later (do not lock null)
        cached = new OpenAiProvider();
        return cached;
    }

    // 'none', 'disabled' and unknown providers lock null
    cached = null;
    return null;
}

// Optional: for tests/hot-reload
export function resetLLMProviderCacheForTests(): void {
    cached = undefined;
}
