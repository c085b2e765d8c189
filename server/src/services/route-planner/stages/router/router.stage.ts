/**
 * ROUTING Stage - Context Router
 *
 * Decides whether a message starts a new request or modifies the prior turn.
 * The LLM analyses the wording; the decision itself comes from the
 * deterministic rules in applyRoutingRules.
 */

import { logger } from '../../../../lib/logger/structured-logger.js';
import { startStage, endStage } from '../../../../lib/telemetry/stage-timer.js';
import { foldLocality, isSameLocality } from '../../locality/locality.js';
import type { ConversationTurn, OperationType, PlannerContext, RoutingDecision } from '../../types.js';
import type { IntentAnalysis, IntentClassifier } from './intent-classifier.js';

/**
 * Singular/plural-insensitive category key: "Bar" and "bars" compare equal
 */
export function categoryKey(value: string): string {
  return foldLocality(value)
    .split(' ')
    .map(word => (word.length > 3 && word.endsWith('s') ? word.slice(0, -1) : word))
    .join(' ');
}

function sameCategory(a: string, b: string): boolean {
  return categoryKey(a) === categoryKey(b);
}

export function newRequestDecision(reasoning: string, changes?: { locationChanged: boolean; categoryChanged: boolean }): RoutingDecision {
  return {
    isNewRequest: true,
    operationType: 'new',
    usePreviousContext: false,
    countAdjustment: 0,
    reasoning,
    locationChanged: changes?.locationChanged ?? false,
    categoryChanged: changes?.categoryChanged ?? false,
    removePositions: []
  };
}

/**
 * 1-based, in range, unique, ascending; never every place
 */
function sanitizeRemovePositions(positions: readonly number[], placeCount: number): number[] {
  const valid = [...new Set(positions)]
    .filter(p => Number.isInteger(p) && p >= 1 && p <= placeCount)
    .sort((a, b) => a - b);
  return valid.slice(0, Math.max(0, placeCount - 1));
}

/**
 * Deterministic decision rules applied to the LLM analysis
 */
export function applyRoutingRules(analysis: IntentAnalysis, previousTurn: ConversationTurn): RoutingDecision {
  const prev = previousTurn.previousClassification;

  const locationChanged = analysis.mentionedLocation?.trim()
    ? !isSameLocality(analysis.mentionedLocation, prev.location)
    : analysis.locationChanged;
  const categoryChanged = analysis.mentionedCategory?.trim()
    ? !sameCategory(analysis.mentionedCategory, prev.category)
    : analysis.categoryChanged;
  const changes = { locationChanged, categoryChanged };
  const reasoning = analysis.reasoning.trim();

  if (locationChanged && categoryChanged) {
    return newRequestDecision(reasoning || 'Location and category both changed', changes);
  }

  let operationType: OperationType = analysis.operationType;
  const magnitude = Math.abs(analysis.countAdjustment);

  // Ambiguous between add and replace_all: add wins unless everything was rejected
  if (operationType === 'replace_all' && !analysis.negatesAllPrevious) {
    operationType = 'add';
  }

  if (operationType === 'new') {
    return newRequestDecision(reasoning || 'Unrelated to the previous request', changes);
  }

  // One of location/category moved: the previous classification no longer fits
  if ((locationChanged || categoryChanged) &&
    (operationType === 'add' || operationType === 'replace_last' || operationType === 'replace_all')) {
    operationType = 'refine';
  }

  let countAdjustment = 0;
  let removePositions: number[] = [];

  if (operationType === 'add') {
    countAdjustment = magnitude || 1;
  } else if (operationType === 'remove') {
    removePositions = sanitizeRemovePositions(analysis.removePositions, previousTurn.previousPlaces.length);
    countAdjustment = -(removePositions.length || magnitude || 1);
  }

  return {
    isNewRequest: false,
    operationType,
    usePreviousContext: true,
    countAdjustment,
    reasoning: reasoning || `Modification of the previous request (${operationType})`,
    locationChanged,
    categoryChanged,
    removePositions
  };
}

/**
 * Target place count after applying a decision to the previous count.
 * new/refine take their count from a fresh classification instead.
 */
export function targetCountFor(decision: RoutingDecision, previousCount: number): number {
  switch (decision.operationType) {
    case 'add':
      return previousCount + decision.countAdjustment;
    case 'remove':
      return Math.max(1, previousCount + decision.countAdjustment);
    default:
      return previousCount;
  }
}

export class ContextRouter {
  constructor(private readonly intentClassifier: IntentClassifier) {}

  async route(
    currentMessage: string,
    previousTurn: ConversationTurn | null | undefined,
    ctx: PlannerContext
  ): Promise<RoutingDecision> {
    if (!previousTurn) {
      return newRequestDecision('No previous turn');
    }

    const startTime = startStage(ctx, 'routing', {
      previousCount: previousTurn.previousPlaces.length
    });

    const analysis = await this.intentClassifier.classifyIntent(currentMessage, { previousTurn, ctx });
    const decision = applyRoutingRules(analysis, previousTurn);

    if (decision.operationType !== analysis.operationType) {
      logger.info({
        requestId: ctx.requestId,
        stage: 'routing',
        event: 'routing_override',
        llmOperation: analysis.operationType,
        operation: decision.operationType,
        locationChanged: decision.locationChanged,
        categoryChanged: decision.categoryChanged
      }, '[PLANNER] Routing rules overrode LLM operation');
    }

    endStage(ctx, 'routing', startTime, {
      operationType: decision.operationType,
      countAdjustment: decision.countAdjustment
    });

    return decision;
  }
}
