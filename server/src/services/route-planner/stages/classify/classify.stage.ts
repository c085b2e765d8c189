/**
 * CLASSIFY Stage
 *
 * Extracts location, category, count, theme and travel mode from free text.
 * The LLM returns raw fields; normalization (canonical city, travel-mode
 * fallback, theme cleanup) is applied deterministically afterwards.
 */

import { z } from 'zod';
import type { Message } from '../../../../llm/types.js';
import { logger } from '../../../../lib/logger/structured-logger.js';
import { startStage, endStage } from '../../../../lib/telemetry/stage-timer.js';
import { canonicalLocality } from '../../locality/locality.js';
import { callStructuredStage, type RetryPolicy } from '../structured-call.js';
import {
  TRAVEL_MODES,
  type ConversationTurn,
  type LLMStageDeps,
  type NotARouteRequest,
  type PlannerContext,
  type QueryClassification,
  type TravelMode
} from '../../types.js';
import {
  CLASSIFY_JSON_SCHEMA,
  CLASSIFY_PROMPT_VERSION,
  CLASSIFY_SCHEMA_HASH,
  CLASSIFY_SYSTEM_PROMPT
} from './classify.prompt.js';

export const ClassifyLLMSchema = z.object({
  isRouteRequest: z.boolean(),
  location: z.string(),
  category: z.string(),
  count: z.number().int(),
  theme: z.string().nullable(),
  travelMode: z.string().nullable(),
  reasoning: z.string()
}).strict();

export type ClassifyLLMResult = z.infer<typeof ClassifyLLMSchema>;

export interface QueryClassifier {
  classify(
    text: string,
    ctx: PlannerContext,
    previousTurn?: ConversationTurn | null
  ): Promise<QueryClassification | NotARouteRequest>;
}

function isTravelMode(value: string): value is TravelMode {
  return TRAVEL_MODES.some(mode => mode === value);
}

export function normalizeTravelMode(value: string | null, fallback: TravelMode): TravelMode {
  const mode = value?.trim().toLowerCase() ?? '';
  return isTravelMode(mode) ? mode : fallback;
}

/**
 * Deterministic post-processing of the LLM answer
 */
export function toClassification(
  llmResult: ClassifyLLMResult,
  defaultTravelMode: TravelMode
): QueryClassification | NotARouteRequest {
  const location = llmResult.location.trim();
  const category = llmResult.category.trim().toLowerCase();

  if (!llmResult.isRouteRequest || !location || !category) {
    return {
      kind: 'NOT_A_ROUTE_REQUEST',
      reasoning: llmResult.reasoning.trim() || 'Message is not a place or route request'
    };
  }

  const theme = llmResult.theme?.trim();

  return {
    location: canonicalLocality(location),
    category,
    count: Math.max(1, llmResult.count),
    theme: theme ? theme : null,
    travelMode: normalizeTravelMode(llmResult.travelMode, defaultTravelMode)
  };
}

export function isNotARouteRequest(
  value: QueryClassification | NotARouteRequest
): value is NotARouteRequest {
  return 'kind' in value && value.kind === 'NOT_A_ROUTE_REQUEST';
}

function buildMessages(text: string, previousTurn?: ConversationTurn | null): Message[] {
  const messages: Message[] = [{ role: 'system', content: CLASSIFY_SYSTEM_PROMPT }];

  if (previousTurn) {
    const prev = previousTurn.previousClassification;
    const names = previousTurn.previousPlaces.map((p, i) => `${i + 1}. ${p.name}`).join('\n');
    messages.push(
      { role: 'user', content: previousTurn.previousRequestText },
      {
        role: 'assistant',
        content: `Prior turn: ${prev.count} ${prev.category} in ${prev.location}, ${prev.travelMode}.` +
          (names ? `\n${names}` : '')
      }
    );
  }

  messages.push({ role: 'user', content: text });
  return messages;
}

export class LlmQueryClassifier implements QueryClassifier {
  constructor(
    private readonly deps: LLMStageDeps,
    private readonly policy: RetryPolicy & { defaultTravelMode: TravelMode }
  ) {}

  async classify(
    text: string,
    ctx: PlannerContext,
    previousTurn?: ConversationTurn | null
  ): Promise<QueryClassification | NotARouteRequest> {
    const startTime = startStage(ctx, 'classify', { hasPreviousTurn: !!previousTurn });

    const llmResult = await callStructuredStage(this.deps, this.policy, ctx, {
      stage: 'classify',
      purpose: 'classify',
      messages: buildMessages(text, previousTurn),
      schema: ClassifyLLMSchema,
      jsonSchema: CLASSIFY_JSON_SCHEMA,
      promptVersion: CLASSIFY_PROMPT_VERSION,
      schemaHash: CLASSIFY_SCHEMA_HASH
    });

    const result = toClassification(llmResult, this.policy.defaultTravelMode);

    if (isNotARouteRequest(result)) {
      endStage(ctx, 'classify', startTime, { isRouteRequest: false });
      logger.info({
        requestId: ctx.requestId,
        stage: 'classify',
        event: 'not_a_route_request',
        reasoning: result.reasoning
      }, '[PLANNER] Message is not a route request');
      return result;
    }

    endStage(ctx, 'classify', startTime, {
      isRouteRequest: true,
      location: result.location,
      category: result.category,
      count: result.count,
      travelMode: result.travelMode
    });

    return result;
  }
}
