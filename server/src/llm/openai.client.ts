import 'dotenv/config';
import OpenAI from 'openai';

let client: OpenAI | null = null;

/**
 * Shared OpenAI client, created on first use so that importing this module
 * never fails when OPENAI_API_KEY is absent (factory checks the key first).
 */
export function getOpenAIClient(): OpenAI {
    if (!client) {
        client = new OpenAI({ apiKey: process.env.OPENAI_API_KEY });
    }
    return client;
}
