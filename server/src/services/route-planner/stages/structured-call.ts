/**
 * Structured LLM call with the pipeline's retry-once policy
 *
 * Shared by the routing, classify and suggest stages: resolves the model for
 * the purpose, retries one failure with the same input, and turns a second
 * failure into StageUnavailableError. A cancelled request propagates as
 * RequestAbortedError and is never retried.
 */

import type { z } from 'zod';
import type { Message, StructuredOutputSchema } from '../../../llm/types.js';
import { RetryHandler } from '../../../llm/retry-handler.js';
import { resolveLLM } from '../../../lib/llm/llm-resolver.js';
import type { LLMPurpose } from '../../../lib/llm/llm-purpose.js';
import { isRequestAborted } from '../../../lib/reliability/abort-guard.js';
import { StageUnavailableError } from '../pipeline-errors.js';
import type { LLMStageDeps, PlannerContext, PlannerStage } from '../types.js';

export interface RetryPolicy {
  stageMaxAttempts: number;
  retryBackoffMs: number;
}

export interface StructuredCall<T extends z.ZodTypeAny> {
  stage: PlannerStage;
  purpose: LLMPurpose;
  messages: Message[];
  schema: T;
  jsonSchema: StructuredOutputSchema;
  promptVersion: string;
  schemaHash: string;
  temperature?: number;
}

export function createRetryHandler(policy: RetryPolicy): RetryHandler {
  return new RetryHandler({
    maxAttempts: policy.stageMaxAttempts,
    backoffMs: [0, policy.retryBackoffMs]
  });
}

export async function callStructuredStage<T extends z.ZodTypeAny>(
  deps: LLMStageDeps,
  policy: RetryPolicy,
  ctx: PlannerContext,
  call: StructuredCall<T>
): Promise<z.infer<T>> {
  const { model, timeoutMs } = resolveLLM(call.purpose);
  const retry = createRetryHandler(policy);

  try {
    const response = await retry.executeWithRetry(() => deps.llmProvider.completeJSON(
      call.messages,
      call.schema,
      {
        model,
        temperature: call.temperature ?? 0,
        timeout: timeoutMs,
        requestId: ctx.requestId,
        stage: call.stage,
        promptVersion: call.promptVersion,
        schemaHash: call.schemaHash,
        ...(ctx.abortSignal && { signal: ctx.abortSignal })
      },
      call.jsonSchema
    ), {
      requestId: ctx.requestId,
      stage: call.stage,
      signal: ctx.abortSignal
    });
    return response.data;
  } catch (error) {
    if (isRequestAborted(error)) {
      throw error;
    }
    throw new StageUnavailableError(call.stage, error);
  }
}
