/**
 * Route Planner Types
 *
 * Pipeline data model: conversation snapshot in, route plan (or a
 * non-plan outcome) out. Everything here is created fresh per turn.
 */

import type { LLMProvider } from '../../llm/types.js';

export type TravelMode = 'walking' | 'driving' | 'transit';

export const TRAVEL_MODES: readonly TravelMode[] = ['walking', 'driving', 'transit'];

export type OperationType = 'new' | 'add' | 'remove' | 'replace_last' | 'replace_all' | 'refine';

export interface Coordinates {
  lat: number;
  lng: number;
}

export interface QueryClassification {
  /** Canonical city name (locale variants collapse to one form) */
  location: string;
  /** Kind of place requested: "bars", "museums", "parks" */
  category: string;
  count: number;
  theme: string | null;
  travelMode: TravelMode;
}

/** Returned by the classifier when the message is not a place/route request */
export interface NotARouteRequest {
  kind: 'NOT_A_ROUTE_REQUEST';
  reasoning: string;
}

export interface RoutingDecision {
  isNewRequest: boolean;
  operationType: OperationType;
  usePreviousContext: boolean;
  /** Signed delta; meaningful only for add (+N) and remove (-N) */
  countAdjustment: number;
  reasoning: string;
  locationChanged: boolean;
  categoryChanged: boolean;
  /** 1-based positions a remove message points at (empty: drop from the end) */
  removePositions: number[];
}

export interface PlaceSuggestion {
  name: string;
  shortDescription: string;
  whyRecommended: string;
}

export interface SuggestionBatch {
  places: PlaceSuggestion[];
  routeDescription: string;
  estimatedDuration: string;
}

export interface ResolvedPlace {
  name: string;
  description: string;
  address: string;
  coordinates: Coordinates;
  /** Opaque identifier from the places service */
  externalId: string;
  rating: number | null;
  userRatingsTotal: number | null;
  /** Photo resource name (no key); clients fetch through their own proxy */
  photoReference: string | null;
  mapLink: string;
}

/**
 * Prior turn state, owned by the caller's session store.
 * Read-only to the pipeline.
 */
export interface ConversationTurn {
  readonly previousRequestText: string;
  readonly previousClassification: Readonly<QueryClassification>;
  readonly previousPlaces: readonly ResolvedPlace[];
}

export interface RouteSegment {
  from: ResolvedPlace;
  to: ResolvedPlace;
  directionsLink: string;
  embedUrl: string;
}

export interface RoutePlan {
  title: string;
  description: string;
  estimatedDuration: string;
  travelMode: TravelMode;
  points: ResolvedPlace[];
  segments: RouteSegment[];
  fullRouteMapUrl: string;
  fullRouteLink: string;
}

export type PlannerStage = 'routing' | 'classify' | 'suggest' | 'resolve' | 'order' | 'assemble';

/**
 * Outcome of one handleMessage call. Only ROUTE_PLAN and PARTIAL_ROUTE_PLAN
 * carry a plan; every other kind is rendered as a message by the caller.
 */
export type PlannerOutcome =
  | {
    kind: 'ROUTE_PLAN';
    plan: RoutePlan;
    decision: RoutingDecision;
    classification: QueryClassification;
    message: string;
  }
  | {
    kind: 'PARTIAL_ROUTE_PLAN';
    plan: RoutePlan;
    decision: RoutingDecision;
    classification: QueryClassification;
    requestedCount: number;
    shortfall: number;
    message: string;
  }
  | {
    kind: 'NOT_A_ROUTE_REQUEST';
    decision: RoutingDecision;
    message: string;
  }
  | {
    kind: 'COUNT_LIMIT_EXCEEDED';
    decision: RoutingDecision;
    classification: QueryClassification;
    requestedCount: number;
    maxAllowed: number;
    message: string;
  }
  | {
    kind: 'CLASSIFICATION_UNAVAILABLE';
    stage: PlannerStage;
    message: string;
  }
  | {
    kind: 'ABORTED';
    stage: PlannerStage;
  };

/**
 * Pipeline context, one per request
 */
export interface PlannerContext {
  requestId: string;
  sessionId?: string;
  startTime: number;
  /** Request-scoped abort signal; cancels outstanding calls and later stages */
  abortSignal?: AbortSignal;
  /** Stage durations for decomposition logging */
  timings?: Partial<Record<PlannerStage, number>>;
}

export interface LLMStageDeps {
  llmProvider: LLMProvider;
}

/**
 * Returns true if the request has been aborted.
 */
export function shouldAbort(ctx?: { abortSignal?: AbortSignal | undefined } | null): boolean {
  return ctx?.abortSignal?.aborted === true;
}
