/**
 * SUGGEST Stage - Place Suggestion Generator
 *
 * Proposes named candidate places. Output is filtered deterministically:
 * excluded names and duplicates are dropped (case/accent-insensitive) and
 * the list is cut to the requested count.
 */

import { z } from 'zod';
import type { Message } from '../../../../llm/types.js';
import { logger } from '../../../../lib/logger/structured-logger.js';
import { startStage, endStage } from '../../../../lib/telemetry/stage-timer.js';
import { DEFAULT_ESTIMATED_DURATION } from '../../../../config/index.js';
import { foldLocality } from '../../locality/locality.js';
import { callStructuredStage, type RetryPolicy } from '../structured-call.js';
import type {
  LLMStageDeps,
  OperationType,
  PlaceSuggestion,
  PlannerContext,
  QueryClassification,
  SuggestionBatch
} from '../../types.js';
import {
  SUGGEST_JSON_SCHEMA,
  SUGGEST_PROMPT_VERSION,
  SUGGEST_SCHEMA_HASH,
  SUGGEST_SYSTEM_PROMPT
} from './suggest.prompt.js';

export const SuggestLLMSchema = z.object({
  places: z.array(z.object({
    name: z.string(),
    shortDescription: z.string(),
    whyRecommended: z.string()
  }).strict()),
  routeDescription: z.string(),
  estimatedDuration: z.string()
}).strict();

export interface SuggestionRequest {
  classification: QueryClassification;
  operationType: OperationType;
  countNeeded: number;
  excludedNames: readonly string[];
  /** Names already on the route, for context when refining or extending it */
  currentPlaceNames?: readonly string[];
}

export interface PlaceSuggester {
  suggest(request: SuggestionRequest, ctx: PlannerContext): Promise<SuggestionBatch>;
}

export function placeNameKey(name: string): string {
  return foldLocality(name);
}

/**
 * Drop excluded and repeated names, then cut to `countNeeded`
 */
export function filterSuggestions(
  places: readonly PlaceSuggestion[],
  excludedNames: readonly string[],
  countNeeded: number
): PlaceSuggestion[] {
  const seen = new Set(excludedNames.map(placeNameKey));
  const kept: PlaceSuggestion[] = [];

  for (const place of places) {
    const name = place.name.trim();
    const key = placeNameKey(name);
    if (!key || seen.has(key)) continue;
    seen.add(key);
    kept.push({ ...place, name });
    if (kept.length >= countNeeded) break;
  }

  return kept;
}

function buildUserPrompt(request: SuggestionRequest): string {
  const { classification, countNeeded, operationType } = request;
  const lines = [
    `City: ${classification.location}`,
    `Kind of place: ${classification.category}`,
    `Number of places: ${countNeeded}`,
    `Travel mode: ${classification.travelMode}`
  ];

  if (classification.theme) {
    lines.push(`Theme: ${classification.theme}`);
  }
  if (request.currentPlaceNames && request.currentPlaceNames.length > 0) {
    const verb = operationType === 'refine' ? 'Previous route (adapt it)' : 'Already on the route (stay close to these)';
    lines.push(`${verb}: ${request.currentPlaceNames.join('; ')}`);
  }
  if (request.excludedNames.length > 0) {
    lines.push(`Excluded: ${request.excludedNames.join('; ')}`);
  }

  return lines.join('\n');
}

export class LlmPlaceSuggester implements PlaceSuggester {
  constructor(
    private readonly deps: LLMStageDeps,
    private readonly policy: RetryPolicy
  ) {}

  async suggest(request: SuggestionRequest, ctx: PlannerContext): Promise<SuggestionBatch> {
    if (request.countNeeded <= 0) {
      return { places: [], routeDescription: '', estimatedDuration: DEFAULT_ESTIMATED_DURATION };
    }

    const startTime = startStage(ctx, 'suggest', {
      countNeeded: request.countNeeded,
      excludedCount: request.excludedNames.length,
      operationType: request.operationType
    });

    const messages: Message[] = [
      { role: 'system', content: SUGGEST_SYSTEM_PROMPT },
      { role: 'user', content: buildUserPrompt(request) }
    ];

    const llmResult = await callStructuredStage(this.deps, this.policy, ctx, {
      stage: 'suggest',
      purpose: 'suggest',
      messages,
      schema: SuggestLLMSchema,
      jsonSchema: SUGGEST_JSON_SCHEMA,
      promptVersion: SUGGEST_PROMPT_VERSION,
      schemaHash: SUGGEST_SCHEMA_HASH,
      temperature: 0.7
    });

    const places = filterSuggestions(llmResult.places, request.excludedNames, request.countNeeded);

    if (places.length < llmResult.places.length) {
      logger.debug({
        requestId: ctx.requestId,
        stage: 'suggest',
        returned: llmResult.places.length,
        kept: places.length
      }, '[PLANNER] Dropped excluded, duplicate or surplus suggestions');
    }

    endStage(ctx, 'suggest', startTime, {
      returned: llmResult.places.length,
      kept: places.length
    });

    return {
      places,
      routeDescription: llmResult.routeDescription.trim(),
      estimatedDuration: llmResult.estimatedDuration.trim() || DEFAULT_ESTIMATED_DURATION
    };
  }
}
