/**
 * Pipeline Error Taxonomy
 * Errors a stage may raise to the orchestrator
 */

import type { PlannerStage } from './types.js';

/**
 * A language-model stage failed on both attempts.
 * Mapped to the CLASSIFICATION_UNAVAILABLE outcome, never surfaced as a crash.
 */
export class StageUnavailableError extends Error {
  constructor(
    public readonly stage: PlannerStage,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`${stage} unavailable: ${reason}`, { cause });
    this.name = 'StageUnavailableError';
  }
}

export function isStageUnavailable(error: unknown): error is StageUnavailableError {
  return error instanceof StageUnavailableError;
}

/**
 * User-facing fallback text for an unavailable stage
 */
export function unavailableMessage(stage: PlannerStage): string {
  switch (stage) {
    case 'routing':
    case 'classify':
      return "Sorry, I couldn't understand that request right now. Please try again in a moment.";
    case 'suggest':
      return "Sorry, I couldn't come up with places right now. Please try again in a moment.";
    default:
      return 'Something went wrong while planning your route. Please try again.';
  }
}
