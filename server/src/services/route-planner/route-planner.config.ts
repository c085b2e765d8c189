/**
 * Planner configuration
 * Tunables that a deployment (or a test) may override per RoutePlanner instance
 */

import {
  DEFAULT_TRAVEL_MODE,
  MAX_PLACES_PER_ROUTE,
  PLACES_LOOKUP_CONCURRENCY,
  RESOLVER_MAX_RETRY_ROUNDS,
  STAGE_MAX_ATTEMPTS,
  STAGE_RETRY_BACKOFF_MS
} from '../../config/index.js';
import { getConfig } from '../../config/env.js';
import type { TravelMode } from './types.js';

export interface PlannerConfig {
  defaultTravelMode: TravelMode;
  maxPlacesPerRoute: number;
  /** Replacement rounds after the initial lookup round */
  maxRetryRounds: number;
  lookupConcurrency: number;
  /** Attempts per external call; 2 means one retry */
  stageMaxAttempts: number;
  retryBackoffMs: number;
  /** Key embedded in iframe map URLs; empty string leaves the param blank */
  mapsEmbedApiKey: string;
}

export const DEFAULT_PLANNER_CONFIG: Omit<PlannerConfig, 'mapsEmbedApiKey'> = {
  defaultTravelMode: DEFAULT_TRAVEL_MODE,
  maxPlacesPerRoute: MAX_PLACES_PER_ROUTE,
  maxRetryRounds: RESOLVER_MAX_RETRY_ROUNDS,
  lookupConcurrency: PLACES_LOOKUP_CONCURRENCY,
  stageMaxAttempts: STAGE_MAX_ATTEMPTS,
  retryBackoffMs: STAGE_RETRY_BACKOFF_MS
};

export function resolvePlannerConfig(overrides?: Partial<PlannerConfig>): PlannerConfig {
  return {
    ...DEFAULT_PLANNER_CONFIG,
    ...overrides,
    mapsEmbedApiKey: overrides?.mapsEmbedApiKey ?? getConfig().mapsEmbedApiKey ?? ''
  };
}
