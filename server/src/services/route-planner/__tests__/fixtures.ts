/**
 * Shared test fakes for the route planner
 */

import type { z } from 'zod';
import type { CompleteJSONOptions, LLMProvider, Message, StructuredOutputSchema } from '../../../llm/types.js';
import type { PlaceLookupOptions, PlaceMatch, PlacesLookup } from '../places/places.types.js';
import type { PlaceSuggester, SuggestionRequest } from '../stages/suggest/suggest.stage.js';
import type { IntentAnalysis, IntentClassifier } from '../stages/router/intent-classifier.js';
import type { PlannerConfig } from '../route-planner.config.js';
import type {
  ConversationTurn,
  PlaceSuggestion,
  PlannerContext,
  QueryClassification,
  ResolvedPlace,
  SuggestionBatch
} from '../types.js';

export const TEST_CONFIG: PlannerConfig = {
  defaultTravelMode: 'walking',
  maxPlacesPerRoute: 10,
  maxRetryRounds: 3,
  lookupConcurrency: 4,
  stageMaxAttempts: 2,
  retryBackoffMs: 0,
  mapsEmbedApiKey: ''
};

export function createContext(overrides: Partial<PlannerContext> = {}): PlannerContext {
  return {
    requestId: 'test-req',
    startTime: Date.now(),
    timings: {},
    ...overrides
  };
}

export function makeClassification(overrides: Partial<QueryClassification> = {}): QueryClassification {
  return {
    location: 'Munich',
    category: 'bars',
    count: 5,
    theme: null,
    travelMode: 'walking',
    ...overrides
  };
}

export function makePlace(id: string, lat: number, lng: number, name = `Place ${id}`): ResolvedPlace {
  return {
    name,
    description: `${name} description`,
    address: `${name} street 1, 80331 Munich, Germany`,
    coordinates: { lat, lng },
    externalId: id,
    rating: 4.5,
    userRatingsTotal: 100,
    photoReference: null,
    mapLink: `https://maps.google.com/?cid=${id}`
  };
}

export function makeMatch(id: string, name: string, lat: number, lng: number, locality: string | null = 'Munich'): PlaceMatch {
  return {
    externalId: id,
    name,
    address: `${name}, ${locality ?? 'Somewhere'}, Country`,
    locality,
    coordinates: { lat, lng },
    rating: 4.2,
    userRatingsTotal: 50,
    photoReference: null,
    mapLink: `https://maps.google.com/?cid=${id}`
  };
}

export function makeTurn(places: ResolvedPlace[], overrides: Partial<QueryClassification> = {}, text = 'Top 5 bars in Munich'): ConversationTurn {
  return {
    previousRequestText: text,
    previousClassification: makeClassification({ count: places.length, ...overrides }),
    previousPlaces: places
  };
}

export function suggestion(name: string): PlaceSuggestion {
  return { name, shortDescription: `${name} is nice`, whyRecommended: 'Popular' };
}

export function batchOf(names: string[], extra: Partial<SuggestionBatch> = {}): SuggestionBatch {
  return {
    places: names.map(suggestion),
    routeDescription: 'A short evening route.',
    estimatedDuration: '3 hours',
    ...extra
  };
}

export interface RecordedLLMCall {
  messages: Message[];
  opts: CompleteJSONOptions;
  schemaName: string;
}

/**
 * LLM provider replaying queued payloads; an Error entry is thrown instead
 */
export class FakeLLMProvider implements LLMProvider {
  readonly calls: RecordedLLMCall[] = [];

  constructor(private readonly queue: unknown[]) {}

  async completeJSON<T extends z.ZodTypeAny>(
    messages: Message[],
    schema: T,
    opts: CompleteJSONOptions,
    jsonSchema: StructuredOutputSchema
  ): Promise<{ data: z.infer<T> }> {
    this.calls.push({ messages, opts, schemaName: jsonSchema.name });
    const next = this.queue.shift();
    if (next instanceof Error) {
      throw next;
    }
    if (next === undefined) {
      throw new Error('FakeLLMProvider queue is empty');
    }
    return { data: schema.parse(next) };
  }
}

export class FakeIntentClassifier implements IntentClassifier {
  readonly calls: string[] = [];

  constructor(private readonly analysis: IntentAnalysis | Error) {}

  async classifyIntent(text: string): Promise<IntentAnalysis> {
    this.calls.push(text);
    if (this.analysis instanceof Error) throw this.analysis;
    return this.analysis;
  }
}

export function intent(overrides: Partial<IntentAnalysis>): IntentAnalysis {
  return {
    operationType: 'add',
    mentionedLocation: null,
    mentionedCategory: null,
    locationChanged: false,
    categoryChanged: false,
    countAdjustment: 0,
    removePositions: [],
    negatesAllPrevious: false,
    reasoning: 'test',
    ...overrides
  };
}

type LookupEntry = PlaceMatch | null | Error | Array<PlaceMatch | null | Error>;

/**
 * Places lookup keyed by suggestion name. An array entry is consumed one
 * element per call (for retry scenarios). Unknown names return null.
 */
export class FakePlacesLookup implements PlacesLookup {
  readonly calls: Array<{ name: string; localityHint: string }> = [];
  private readonly entries: Map<string, LookupEntry>;

  constructor(entries: Record<string, LookupEntry>) {
    this.entries = new Map(Object.entries(entries));
  }

  async findBestMatch(name: string, localityHint: string, _opts?: PlaceLookupOptions): Promise<PlaceMatch | null> {
    this.calls.push({ name, localityHint });
    const entry = this.entries.get(name);
    let value: PlaceMatch | null | Error | undefined;
    if (Array.isArray(entry)) {
      value = entry.shift();
    } else {
      value = entry;
    }
    if (value instanceof Error) throw value;
    return value ?? null;
  }
}

/**
 * Suggester replaying queued batches; an Error entry is thrown instead
 */
export class FakeSuggester implements PlaceSuggester {
  readonly requests: SuggestionRequest[] = [];

  constructor(private readonly queue: Array<SuggestionBatch | Error>) {}

  async suggest(request: SuggestionRequest): Promise<SuggestionBatch> {
    this.requests.push(request);
    const next = this.queue.shift();
    if (next instanceof Error) throw next;
    if (!next) {
      return { places: [], routeDescription: '', estimatedDuration: '' };
    }
    return { ...next, places: next.places.slice(0, request.countNeeded) };
  }
}
