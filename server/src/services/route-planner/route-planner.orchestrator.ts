/**
 * Route Planner Orchestrator
 *
 * Router -> (Classifier for new/refine) -> Suggester -> Resolver (+retry)
 * -> Optimizer -> Assembler. One run per inbound message; the previous turn
 * is read, never written.
 */

import { randomUUID } from 'node:crypto';
import { logger } from '../../lib/logger/structured-logger.js';
import { startStage, endStage } from '../../lib/telemetry/stage-timer.js';
import { isRequestAborted, throwIfAborted } from '../../lib/reliability/abort-guard.js';
import { isStageUnavailable, unavailableMessage } from './pipeline-errors.js';
import type { PlannerConfig } from './route-planner.config.js';
import type { ContextRouter } from './stages/router/router.stage.js';
import { targetCountFor } from './stages/router/router.stage.js';
import { isNotARouteRequest, type QueryClassifier } from './stages/classify/classify.stage.js';
import type { PlaceSuggester } from './stages/suggest/suggest.stage.js';
import { PlaceResolver } from './stages/resolve/resolve.stage.js';
import type { PlacesLookup } from './places/places.types.js';
import { orderPlaces, routeLengthKm, type RouteAnchor } from './ranking/route-optimizer.js';
import { assembleRoutePlan } from './response/route-plan.builder.js';
import { formatRouteReply } from './response/reply-text.js';
import type {
  ConversationTurn,
  PlannerContext,
  PlannerOutcome,
  PlannerStage,
  QueryClassification,
  ResolvedPlace,
  RoutingDecision
} from './types.js';

export interface RoutePlannerDeps {
  router: ContextRouter;
  classifier: QueryClassifier;
  suggester: PlaceSuggester;
  places: PlacesLookup;
  config: PlannerConfig;
}

/**
 * What the generation part of a run starts from, per operation
 */
interface GenerationPlan {
  classification: QueryClassification;
  targetCount: number;
  /** Points kept verbatim from the previous turn */
  carried: ResolvedPlace[];
  countNeeded: number;
  excludedNames: string[];
  excludedIds: string[];
  /** Reference names for the suggester (route being extended or refined) */
  contextNames: string[];
  anchor: RouteAnchor | null;
  /** false: carried points keep their order and new ones are appended */
  reorder: boolean;
}

export const NOT_A_ROUTE_REQUEST_MESSAGE =
  'I can plan routes through places in a city. Try something like "Top 5 bars in Munich".';

export function countLimitMessage(requested: number, maxAllowed: number): string {
  return `I can plan routes with up to ${maxAllowed} places, but you asked for ${requested}. Try a smaller number.`;
}

export type PlannerContextInit = Partial<Omit<PlannerContext, 'timings'>>;

export class RoutePlanner {
  private readonly resolver: PlaceResolver;

  constructor(private readonly deps: RoutePlannerDeps) {
    this.resolver = new PlaceResolver(deps.places, deps.suggester, deps.config);
  }

  async handleMessage(
    currentMessage: string,
    previousTurn: ConversationTurn | null | undefined,
    init: PlannerContextInit = {}
  ): Promise<PlannerOutcome> {
    const ctx: PlannerContext = {
      requestId: init.requestId ?? randomUUID(),
      startTime: init.startTime ?? Date.now(),
      timings: {},
      ...(init.sessionId && { sessionId: init.sessionId }),
      ...(init.abortSignal && { abortSignal: init.abortSignal })
    };

    let stage: PlannerStage = 'routing';

    logger.info({
      requestId: ctx.requestId,
      ...(ctx.sessionId && { sessionId: ctx.sessionId }),
      event: 'planner_started',
      hasPreviousTurn: !!previousTurn,
      messageLen: currentMessage.length
    }, '[PLANNER] Pipeline started');

    try {
      throwIfAborted(ctx.abortSignal, stage);
      const decision = await this.deps.router.route(currentMessage, previousTurn, ctx);

      if (decision.operationType === 'remove' && previousTurn) {
        stage = 'assemble';
        return this.finish(ctx, this.applyRemoval(decision, previousTurn));
      }

      stage = 'classify';
      throwIfAborted(ctx.abortSignal, stage);
      const planOrOutcome = await this.buildGenerationPlan(currentMessage, decision, previousTurn, ctx);
      if ('kind' in planOrOutcome) {
        return this.finish(ctx, planOrOutcome);
      }
      const plan = planOrOutcome;

      if (plan.targetCount > this.deps.config.maxPlacesPerRoute) {
        return this.finish(ctx, {
          kind: 'COUNT_LIMIT_EXCEEDED',
          decision,
          classification: plan.classification,
          requestedCount: plan.targetCount,
          maxAllowed: this.deps.config.maxPlacesPerRoute,
          message: countLimitMessage(plan.targetCount, this.deps.config.maxPlacesPerRoute)
        });
      }

      stage = 'suggest';
      throwIfAborted(ctx.abortSignal, stage);
      const batch = await this.deps.suggester.suggest({
        classification: plan.classification,
        operationType: decision.operationType,
        countNeeded: plan.countNeeded,
        excludedNames: plan.excludedNames,
        currentPlaceNames: plan.contextNames
      }, ctx);

      stage = 'resolve';
      const resolved = await this.resolver.resolve({
        suggestions: batch.places,
        classification: plan.classification,
        operationType: decision.operationType,
        countNeeded: plan.countNeeded,
        excludedNames: plan.excludedNames,
        excludedIds: plan.excludedIds,
        currentPlaceNames: plan.contextNames
      }, ctx);

      stage = 'order';
      throwIfAborted(ctx.abortSignal, stage);
      const orderStart = startStage(ctx, 'order', { count: plan.carried.length + resolved.places.length });
      const points = plan.reorder
        ? orderPlaces([...plan.carried, ...resolved.places], plan.anchor)
        : [...plan.carried, ...resolved.places];
      endStage(ctx, 'order', orderStart, { routeLengthKm: Math.round(routeLengthKm(points) * 10) / 10 });

      stage = 'assemble';
      const routePlan = assembleRoutePlan(points, plan.classification, {
        routeDescription: batch.routeDescription,
        estimatedDuration: batch.estimatedDuration,
        mapsEmbedApiKey: this.deps.config.mapsEmbedApiKey
      });

      const shortfall = Math.max(0, plan.targetCount - points.length);
      if (shortfall > 0) {
        return this.finish(ctx, {
          kind: 'PARTIAL_ROUTE_PLAN',
          plan: routePlan,
          decision,
          classification: plan.classification,
          requestedCount: plan.targetCount,
          shortfall,
          message: formatRouteReply(routePlan, shortfall)
        });
      }

      return this.finish(ctx, {
        kind: 'ROUTE_PLAN',
        plan: routePlan,
        decision,
        classification: plan.classification,
        message: formatRouteReply(routePlan)
      });
    } catch (error) {
      if (isRequestAborted(error)) {
        return this.finish(ctx, { kind: 'ABORTED', stage });
      }
      if (isStageUnavailable(error)) {
        return this.finish(ctx, {
          kind: 'CLASSIFICATION_UNAVAILABLE',
          stage: error.stage,
          message: unavailableMessage(error.stage)
        });
      }

      logger.error({
        requestId: ctx.requestId,
        event: 'planner_failed',
        stage,
        error: error instanceof Error ? error.message : String(error)
      }, '[PLANNER] Pipeline failed');
      throw error;
    }
  }

  /**
   * Resolve the working classification and what has to be generated
   */
  private async buildGenerationPlan(
    currentMessage: string,
    decision: RoutingDecision,
    previousTurn: ConversationTurn | null | undefined,
    ctx: PlannerContext
  ): Promise<GenerationPlan | PlannerOutcome> {
    const { operationType } = decision;

    if (operationType === 'new' || operationType === 'refine' || !previousTurn) {
      const turnForContext = operationType === 'refine' ? previousTurn : null;
      const result = await this.deps.classifier.classify(currentMessage, ctx, turnForContext);
      if (isNotARouteRequest(result)) {
        return {
          kind: 'NOT_A_ROUTE_REQUEST',
          decision,
          message: NOT_A_ROUTE_REQUEST_MESSAGE
        };
      }
      return {
        classification: result,
        targetCount: result.count,
        carried: [],
        countNeeded: result.count,
        excludedNames: [],
        excludedIds: [],
        contextNames: turnForContext ? turnForContext.previousPlaces.map(p => p.name) : [],
        anchor: null,
        reorder: true
      };
    }

    const prev = previousTurn.previousClassification;
    const prevPlaces = [...previousTurn.previousPlaces];
    const prevNames = prevPlaces.map(p => p.name);
    const prevIds = prevPlaces.map(p => p.externalId);
    const targetCount = targetCountFor(decision, prev.count);
    const classification: QueryClassification = { ...prev, count: targetCount };

    switch (operationType) {
      case 'add': {
        // Counted from the places actually on the route, so a partial previous
        // turn does not inflate the target
        const addTarget = prevPlaces.length + decision.countAdjustment;
        return {
          classification: { ...prev, count: addTarget },
          targetCount: addTarget,
          carried: prevPlaces,
          countNeeded: decision.countAdjustment,
          excludedNames: prevNames,
          excludedIds: prevIds,
          contextNames: prevNames,
          anchor: prevPlaces[0] ?? null,
          reorder: true
        };
      }
      case 'replace_last': {
        const carried = prevPlaces.slice(0, -1);
        return {
          classification,
          targetCount: carried.length + 1,
          carried,
          countNeeded: 1,
          excludedNames: prevNames,
          excludedIds: prevIds,
          contextNames: carried.map(p => p.name),
          anchor: null,
          reorder: false
        };
      }
      case 'replace_all':
        return {
          classification,
          targetCount,
          carried: [],
          countNeeded: targetCount,
          excludedNames: prevNames,
          excludedIds: prevIds,
          contextNames: [],
          anchor: null,
          reorder: true
        };
      default:
        throw new Error(`Unhandled operation: ${operationType}`);
    }
  }

  /**
   * Remove named positions, or drop from the end. No external calls.
   */
  private applyRemoval(decision: RoutingDecision, previousTurn: ConversationTurn): PlannerOutcome {
    const prev = previousTurn.previousClassification;
    const prevPlaces = previousTurn.previousPlaces;
    const removeCount = Math.abs(decision.countAdjustment);

    let points: ResolvedPlace[];
    if (decision.removePositions.length > 0) {
      const drop = new Set(decision.removePositions);
      points = prevPlaces.filter((_, index) => !drop.has(index + 1));
    } else {
      points = prevPlaces.slice(0, Math.max(1, prevPlaces.length - removeCount));
    }

    const classification: QueryClassification = {
      ...prev,
      count: targetCountFor(decision, prev.count)
    };
    const plan = assembleRoutePlan(points, classification, {
      mapsEmbedApiKey: this.deps.config.mapsEmbedApiKey
    });

    return {
      kind: 'ROUTE_PLAN',
      plan,
      decision,
      classification,
      message: formatRouteReply(plan)
    };
  }

  private finish(ctx: PlannerContext, outcome: PlannerOutcome): PlannerOutcome {
    const level = outcome.kind === 'ROUTE_PLAN' ? 'info' : 'warn';
    logger[level]({
      requestId: ctx.requestId,
      ...(ctx.sessionId && { sessionId: ctx.sessionId }),
      event: 'planner_completed',
      outcome: outcome.kind,
      ...('plan' in outcome && { points: outcome.plan.points.length }),
      ...(outcome.kind === 'PARTIAL_ROUTE_PLAN' && { shortfall: outcome.shortfall }),
      durationMs: Date.now() - ctx.startTime,
      timings: ctx.timings
    }, '[PLANNER] Pipeline completed');
    return outcome;
  }
}

/**
 * Snapshot for the next turn. Outcomes without a plan leave the previous
 * turn in place.
 */
export function toConversationTurn(
  message: string,
  outcome: PlannerOutcome,
  previousTurn: ConversationTurn | null = null
): ConversationTurn | null {
  if (outcome.kind === 'ROUTE_PLAN' || outcome.kind === 'PARTIAL_ROUTE_PLAN') {
    return {
      previousRequestText: message,
      previousClassification: outcome.classification,
      previousPlaces: outcome.plan.points
    };
  }
  return previousTurn;
}
