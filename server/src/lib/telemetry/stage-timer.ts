/**
 * Stage Timer Utility
 * Timing instrumentation for planner stages
 *
 * - Orchestration events (planner_started/completed/failed) always at INFO
 * - Stage events: INFO if slower than SLOW_STAGE_MS, DEBUG otherwise
 */

import { performance } from 'node:perf_hooks';
import { logger } from '../logger/structured-logger.js';
import type { PlannerContext, PlannerStage } from '../../services/route-planner/types.js';

export type StageTimerExtra = Record<string, unknown>;

export const SLOW_STAGE_MS = 2000;

const MAJOR_STAGES = new Set<PlannerStage>(['routing', 'resolve']);

/**
 * Start a stage and log stage_started
 */
export function startStage(
  ctx: PlannerContext,
  stage: PlannerStage,
  extra?: StageTimerExtra
): number {
  const startTime = performance.now();

  if (!ctx.timings) {
    ctx.timings = {};
  }

  const logLevel = MAJOR_STAGES.has(stage) ? 'info' : 'debug';

  logger[logLevel]({
    requestId: ctx.requestId,
    ...(ctx.sessionId && { sessionId: ctx.sessionId }),
    stage,
    event: 'stage_started',
    ...extra
  }, `[PLANNER] ${stage} started`);

  return startTime;
}

/**
 * End a stage, store its duration on the context and log stage_completed
 */
export function endStage(
  ctx: PlannerContext,
  stage: PlannerStage,
  startTime: number,
  extra?: StageTimerExtra
): number {
  const durationMs = Math.round(performance.now() - startTime);

  if (!ctx.timings) {
    ctx.timings = {};
  }
  ctx.timings[stage] = (ctx.timings[stage] ?? 0) + durationMs;

  const isSlow = durationMs > SLOW_STAGE_MS;
  const logLevel = MAJOR_STAGES.has(stage) || isSlow ? 'info' : 'debug';

  logger[logLevel]({
    requestId: ctx.requestId,
    ...(ctx.sessionId && { sessionId: ctx.sessionId }),
    stage,
    event: 'stage_completed',
    durationMs,
    ...(isSlow && { slow: true }),
    ...extra
  }, `[PLANNER] ${stage} completed`);

  return durationMs;
}
