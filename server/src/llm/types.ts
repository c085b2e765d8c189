import { createHash } from 'node:crypto';
import type { z } from 'zod';

export type Message = {
    role: 'system' | 'user' | 'assistant';
    content: string;
};

export type JsonSchema = { [key: string]: unknown };

/**
 * Static JSON Schema sent as an OpenAI Structured Outputs response format.
 * Written by hand next to its Zod twin: strict mode wants every property
 * required and nullables spelled as type unions.
 */
export interface StructuredOutputSchema {
    name: string;
    schema: JsonSchema;
}

export interface CompleteJSONOptions {
    model?: string;
    temperature?: number;
    timeout?: number;
    /** Request-scoped cancellation */
    signal?: AbortSignal;
    requestId?: string;
    stage?: string;
    promptVersion?: string;
    schemaHash?: string;
}

export interface LLMTokenUsage {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
}

export interface LLMCompletionResult<T> {
    data: T;
    usage?: LLMTokenUsage;
    model?: string;
}

export interface LLMProvider {
    completeJSON<T extends z.ZodTypeAny>(
        messages: Message[],
        schema: T,
        opts: CompleteJSONOptions,
        jsonSchema: StructuredOutputSchema
    ): Promise<LLMCompletionResult<z.infer<T>>>;
}

/**
 * Stable 12-char hash of a JSON schema for log correlation
 */
export function hashJsonSchema(schema: JsonSchema): string {
    return createHash('sha256')
        .update(JSON.stringify(schema))
        .digest('hex')
        .substring(0, 12);
}
