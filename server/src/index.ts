/**
 * Route planner entry point
 * Wires the real LLM provider and Google Places client into a RoutePlanner.
 */

import { getConfig } from './config/env.js';
import { createLLMProvider } from './llm/factory.js';
import { logger } from './lib/logger/structured-logger.js';
import { resolvePlannerConfig, type PlannerConfig } from './services/route-planner/route-planner.config.js';
import { RoutePlanner } from './services/route-planner/route-planner.orchestrator.js';
import { ContextRouter } from './services/route-planner/stages/router/router.stage.js';
import { LlmIntentClassifier } from './services/route-planner/stages/router/intent-classifier.js';
import { LlmQueryClassifier } from './services/route-planner/stages/classify/classify.stage.js';
import { LlmPlaceSuggester } from './services/route-planner/stages/suggest/suggest.stage.js';
import { GooglePlacesClient } from './services/route-planner/places/google-places.client.js';
import type { PlacesLookup } from './services/route-planner/places/places.types.js';
import type { LLMProvider } from './llm/types.js';

export interface CreateRoutePlannerOptions {
  config?: Partial<PlannerConfig>;
  llmProvider?: LLMProvider;
  places?: PlacesLookup;
}

export function createRoutePlanner(options: CreateRoutePlannerOptions = {}): RoutePlanner {
  const config = resolvePlannerConfig(options.config);

  const llmProvider = options.llmProvider ?? createLLMProvider();
  if (!llmProvider) {
    throw new Error('OPENAI_API_KEY is not configured');
  }

  const googleApiKey = getConfig().googleApiKey;
  const places = options.places ?? new GooglePlacesClient({ apiKey: googleApiKey ?? '' });

  logger.info({
    event: 'planner_configured',
    maxPlacesPerRoute: config.maxPlacesPerRoute,
    maxRetryRounds: config.maxRetryRounds,
    lookupConcurrency: config.lookupConcurrency,
    defaultTravelMode: config.defaultTravelMode,
    embedKeyPresent: config.mapsEmbedApiKey.length > 0
  }, '[PLANNER] Route planner created');

  const deps = { llmProvider };
  return new RoutePlanner({
    router: new ContextRouter(new LlmIntentClassifier(deps, config)),
    classifier: new LlmQueryClassifier(deps, config),
    suggester: new LlmPlaceSuggester(deps, config),
    places,
    config
  });
}

export { RoutePlanner, toConversationTurn } from './services/route-planner/route-planner.orchestrator.js';
export { resolvePlannerConfig, DEFAULT_PLANNER_CONFIG } from './services/route-planner/route-planner.config.js';
export type { PlannerConfig } from './services/route-planner/route-planner.config.js';
export { ContextRouter } from './services/route-planner/stages/router/router.stage.js';
export type { IntentClassifier, IntentAnalysis } from './services/route-planner/stages/router/intent-classifier.js';
export type { QueryClassifier } from './services/route-planner/stages/classify/classify.stage.js';
export type { PlaceSuggester } from './services/route-planner/stages/suggest/suggest.stage.js';
export type { PlacesLookup, PlaceMatch } from './services/route-planner/places/places.types.js';
export { GooglePlacesClient } from './services/route-planner/places/google-places.client.js';
export { orderPlaces } from './services/route-planner/ranking/route-optimizer.js';
export { assembleRoutePlan } from './services/route-planner/response/route-plan.builder.js';
export { StageUnavailableError } from './services/route-planner/pipeline-errors.js';
export type * from './services/route-planner/types.js';
