/**
 * RESOLVE Stage - Place Resolver
 *
 * Bounded state machine: one initial lookup round, then up to
 * `maxRetryRounds` replacement rounds. Each round looks up its batch
 * concurrently (capped), accepts locality-consistent unique matches, and
 * asks the suggester for exactly the missing count with every name seen so
 * far excluded. Rounds are sequential.
 */

import { logger } from '../../../../lib/logger/structured-logger.js';
import { startStage, endStage } from '../../../../lib/telemetry/stage-timer.js';
import { ConcurrencyLimiter } from '../../../../lib/concurrency/concurrency-limiter.js';
import { isRequestAborted, throwIfAborted } from '../../../../lib/reliability/abort-guard.js';
import { isLocalityMatch } from '../../locality/locality.js';
import { createRetryHandler, type RetryPolicy } from '../structured-call.js';
import { placeNameKey, type PlaceSuggester } from '../suggest/suggest.stage.js';
import type { PlaceMatch, PlacesLookup } from '../../places/places.types.js';
import type {
  OperationType,
  PlaceSuggestion,
  PlannerContext,
  QueryClassification,
  ResolvedPlace
} from '../../types.js';

export type RejectionReason = 'not_found' | 'locality_mismatch' | 'duplicate' | 'lookup_failed';

export interface RejectedSuggestion {
  name: string;
  reason: RejectionReason;
  round: number;
  /** Address or error text, for logs */
  detail?: string;
}

export interface ResolveRequest {
  /** Initial batch from the suggestion stage */
  suggestions: readonly PlaceSuggestion[];
  classification: QueryClassification;
  operationType: OperationType;
  countNeeded: number;
  /** Names never to be suggested again (carried-over and previous places) */
  excludedNames?: readonly string[];
  /** Ids already on the route */
  excludedIds?: readonly string[];
  currentPlaceNames?: readonly string[];
}

export interface ResolveResult {
  places: ResolvedPlace[];
  rejected: RejectedSuggestion[];
  /** Replacement rounds actually run (0 = initial round only) */
  rounds: number;
  shortfall: number;
}

export interface ResolverConfig extends RetryPolicy {
  maxRetryRounds: number;
  lookupConcurrency: number;
}

type LookupOutcome =
  | { ok: true; match: PlaceMatch | null }
  | { ok: false; error: unknown };

interface ResolverState {
  round: number;
  accepted: ResolvedPlace[];
  acceptedIds: Set<string>;
  seenNames: string[];
  seenKeys: Set<string>;
  rejected: RejectedSuggestion[];
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toResolvedPlace(suggestion: PlaceSuggestion, match: PlaceMatch): ResolvedPlace {
  return {
    name: match.name || suggestion.name,
    description: suggestion.shortDescription,
    address: match.address,
    coordinates: match.coordinates,
    externalId: match.externalId,
    rating: match.rating,
    userRatingsTotal: match.userRatingsTotal,
    photoReference: match.photoReference,
    mapLink: match.mapLink
  };
}

export class PlaceResolver {
  constructor(
    private readonly places: PlacesLookup,
    private readonly suggester: PlaceSuggester,
    private readonly config: ResolverConfig
  ) {}

  async resolve(request: ResolveRequest, ctx: PlannerContext): Promise<ResolveResult> {
    const targetCity = request.classification.location;
    const state: ResolverState = {
      round: 0,
      accepted: [],
      acceptedIds: new Set(request.excludedIds ?? []),
      seenNames: [],
      seenKeys: new Set(),
      rejected: []
    };
    for (const name of request.excludedNames ?? []) {
      this.markSeen(state, name);
    }

    const startTime = startStage(ctx, 'resolve', {
      countNeeded: request.countNeeded,
      initialSuggestions: request.suggestions.length
    });

    let batch: readonly PlaceSuggestion[] = request.suggestions;

    while (true) {
      throwIfAborted(ctx.abortSignal, 'resolve');
      await this.runRound(batch, targetCity, request.countNeeded, state, ctx);

      const missing = request.countNeeded - state.accepted.length;
      if (missing <= 0 || state.round >= this.config.maxRetryRounds) {
        break;
      }

      throwIfAborted(ctx.abortSignal, 'resolve');
      state.round++;

      const replacements = await this.requestReplacements(request, missing, state, ctx);
      if (replacements.length === 0) {
        break;
      }
      batch = replacements;
    }

    const shortfall = Math.max(0, request.countNeeded - state.accepted.length);

    endStage(ctx, 'resolve', startTime, {
      accepted: state.accepted.length,
      rejected: state.rejected.length,
      rounds: state.round,
      shortfall
    });

    if (shortfall > 0) {
      logger.warn({
        requestId: ctx.requestId,
        stage: 'resolve',
        event: 'resolve_shortfall',
        countNeeded: request.countNeeded,
        accepted: state.accepted.length,
        rounds: state.round,
        rejections: state.rejected.map(r => r.reason)
      }, '[PLANNER] Retry budget spent, returning partial set');
    }

    return {
      places: state.accepted,
      rejected: state.rejected,
      rounds: state.round,
      shortfall
    };
  }

  private markSeen(state: ResolverState, name: string): void {
    const key = placeNameKey(name);
    if (!key || state.seenKeys.has(key)) return;
    state.seenKeys.add(key);
    state.seenNames.push(name);
  }

  private async runRound(
    batch: readonly PlaceSuggestion[],
    targetCity: string,
    countNeeded: number,
    state: ResolverState,
    ctx: PlannerContext
  ): Promise<void> {
    const limiter = new ConcurrencyLimiter(this.config.lookupConcurrency);
    const retry = createRetryHandler(this.config);

    const outcomes = await limiter.map(batch, async (suggestion): Promise<LookupOutcome> => {
      try {
        const match = await retry.executeWithRetry(
          () => this.places.findBestMatch(suggestion.name, targetCity, {
            requestId: ctx.requestId,
            signal: ctx.abortSignal
          }),
          { requestId: ctx.requestId, stage: 'resolve', signal: ctx.abortSignal }
        );
        return { ok: true, match };
      } catch (error) {
        return { ok: false, error };
      }
    });

    // Accept in suggestion order so results do not depend on lookup timing
    batch.forEach((suggestion, index) => {
      this.markSeen(state, suggestion.name);
      const outcome = outcomes[index];
      if (!outcome) return;

      const reject = (reason: RejectionReason, detail?: string) => {
        state.rejected.push({ name: suggestion.name, reason, round: state.round, ...(detail && { detail }) });
      };

      if (!outcome.ok) {
        if (isRequestAborted(outcome.error)) {
          return;
        }
        reject('lookup_failed', errorText(outcome.error));
        return;
      }

      const { match } = outcome;
      if (!match) {
        reject('not_found');
        return;
      }
      this.markSeen(state, match.name);

      if (!isLocalityMatch(targetCity, match.locality, match.address)) {
        reject('locality_mismatch', match.address);
        return;
      }
      if (state.acceptedIds.has(match.externalId)) {
        reject('duplicate', match.externalId);
        return;
      }
      if (state.accepted.length >= countNeeded) {
        return;
      }

      state.acceptedIds.add(match.externalId);
      state.accepted.push(toResolvedPlace(suggestion, match));
    });

    throwIfAborted(ctx.abortSignal, 'resolve');

    logger.debug({
      requestId: ctx.requestId,
      stage: 'resolve',
      round: state.round,
      batchSize: batch.length,
      accepted: state.accepted.length
    }, '[PLANNER] Resolver round completed');
  }

  private async requestReplacements(
    request: ResolveRequest,
    missing: number,
    state: ResolverState,
    ctx: PlannerContext
  ): Promise<PlaceSuggestion[]> {
    try {
      const batch = await this.suggester.suggest({
        classification: request.classification,
        operationType: request.operationType,
        countNeeded: missing,
        excludedNames: [...state.seenNames],
        currentPlaceNames: [...(request.currentPlaceNames ?? []), ...state.accepted.map(p => p.name)]
      }, ctx);
      return batch.places;
    } catch (error) {
      if (isRequestAborted(error)) {
        throw error;
      }
      logger.warn({
        requestId: ctx.requestId,
        stage: 'resolve',
        event: 'replacement_suggest_failed',
        round: state.round,
        missing,
        error: errorText(error)
      }, '[PLANNER] Replacement suggestions unavailable, ending retry loop');
      return [];
    }
  }
}
