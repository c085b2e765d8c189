import type { z } from 'zod';
import type OpenAI from 'openai';
import type {
    CompleteJSONOptions,
    LLMCompletionResult,
    LLMProvider,
    Message,
    StructuredOutputSchema
} from './types.js';
import { getOpenAIClient } from './openai.client.js';
import { DEFAULT_LLM_MODEL } from '../config/index.js';
import { logger } from '../lib/logger/structured-logger.js';

/** Fallback timeout (in ms) when the caller does not resolve one per purpose. */
const LLM_JSON_TIMEOUT_MS = 30_000;

function toChatMessages(messages: Message[]): OpenAI.Chat.ChatCompletionMessageParam[] {
    return messages.map((m): OpenAI.Chat.ChatCompletionMessageParam => {
        switch (m.role) {
            case 'system': return { role: 'system', content: m.content };
            case 'assistant': return { role: 'assistant', content: m.content };
            case 'user': return { role: 'user', content: m.content };
        }
    });
}

/**
 * OpenAI provider using Structured Outputs (json_schema, strict).
 * One attempt per call: retry policy belongs to the calling stage, so the
 * SDK's own retries are disabled.
 */
export class OpenAiProvider implements LLMProvider {
    constructor(private readonly client: OpenAI = getOpenAIClient()) { }

    async completeJSON<T extends z.ZodTypeAny>(
        messages: Message[],
        schema: T,
        opts: CompleteJSONOptions,
        jsonSchema: StructuredOutputSchema
    ): Promise<LLMCompletionResult<z.infer<T>>> {
        const tStart = Date.now();
        const model = opts.model || DEFAULT_LLM_MODEL;

        const resp = await this.client.chat.completions.create({
            model,
            messages: toChatMessages(messages),
            temperature: opts.temperature ?? 0,
            response_format: {
                type: 'json_schema',
                json_schema: { name: jsonSchema.name, schema: jsonSchema.schema, strict: true }
            }
        }, {
            timeout: opts.timeout ?? LLM_JSON_TIMEOUT_MS,
            maxRetries: 0,
            ...(opts.signal && { signal: opts.signal })
        });

        const message = resp.choices[0]?.message;
        if (message?.refusal) {
            throw new Error(`LLM refused structured output: ${message.refusal}`);
        }

        const raw = message?.content ?? '';
        // SyntaxError / ZodError propagate to the stage retry policy
        const parsed: unknown = JSON.parse(raw);
        const data = schema.parse(parsed);

        logger.debug({
            requestId: opts.requestId,
            stage: opts.stage,
            model: resp.model,
            schemaHash: opts.schemaHash,
            promptVersion: opts.promptVersion,
            durationMs: Date.now() - tStart,
            totalTokens: resp.usage?.total_tokens
        }, '[LLM] structured completion ok');

        return {
            data,
            model: resp.model,
            ...(resp.usage && {
                usage: {
                    prompt_tokens: resp.usage.prompt_tokens,
                    completion_tokens: resp.usage.completion_tokens,
                    total_tokens: resp.usage.total_tokens
                }
            })
        };
    }
}
