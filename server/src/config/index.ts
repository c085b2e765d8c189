/**
 * Centralized configuration for the route planner.
 * Settings likely to change between deployments (model names, timeouts,
 * limits) live here; per-request behaviour is passed as PlannerConfig.
 */

import type { TravelMode } from '../services/route-planner/types.js';

// === LLM Provider Settings ===

/** The default LLM model to use for structured completions. */
export const DEFAULT_LLM_MODEL = process.env.OPENAI_MODEL || 'gpt-4o-mini';

// === Pipeline Defaults ===

/** Travel mode used when the request does not name one. */
export const DEFAULT_TRAVEL_MODE: TravelMode = 'walking';

/** Upper bound on the number of places in one route. */
export const MAX_PLACES_PER_ROUTE = 10;

/** Replacement rounds the resolver may run after the initial lookup round. */
export const RESOLVER_MAX_RETRY_ROUNDS = 3;

/** Concurrent place lookups within one resolver round. */
export const PLACES_LOOKUP_CONCURRENCY = 4;

/** Attempts per external call (first try + one retry). */
export const STAGE_MAX_ATTEMPTS = 2;

/** Delay (in ms) before the single retry of an external call. */
export const STAGE_RETRY_BACKOFF_MS = 150;

/** Fallback when the model gives no duration estimate. */
export const DEFAULT_ESTIMATED_DURATION = '2-3 hours';

// === Google Places Settings ===

export const PLACES_API_BASE_URL = 'https://places.googleapis.com/v1';

/** Timeout (in ms) for one Text Search call. */
export const PLACES_LOOKUP_TIMEOUT_MS = 10_000;

/** Field mask for Text Search (New); addressComponents carries the locality. */
export const PLACES_FIELD_MASK = 'places.id,places.displayName,places.formattedAddress,places.addressComponents,places.location,places.rating,places.userRatingCount,places.googleMapsUri,places.photos';
