/**
 * Intent Classifier
 * The router's language-model step, behind an interface so tests can fake it
 */

import { z } from 'zod';
import type { Message } from '../../../../llm/types.js';
import { callStructuredStage, type RetryPolicy } from '../structured-call.js';
import type { ConversationTurn, LLMStageDeps, PlannerContext } from '../../types.js';
import {
  ROUTER_JSON_SCHEMA,
  ROUTER_PROMPT_VERSION,
  ROUTER_SCHEMA_HASH,
  ROUTER_SYSTEM_PROMPT
} from './router.prompt.js';

export const OPERATION_TYPES = ['new', 'add', 'remove', 'replace_last', 'replace_all', 'refine'] as const;

export const IntentLLMSchema = z.object({
  operationType: z.enum(OPERATION_TYPES),
  mentionedLocation: z.string().nullable(),
  mentionedCategory: z.string().nullable(),
  locationChanged: z.boolean(),
  categoryChanged: z.boolean(),
  countAdjustment: z.number().int(),
  removePositions: z.array(z.number().int()),
  negatesAllPrevious: z.boolean(),
  reasoning: z.string()
}).strict();

export type IntentAnalysis = z.infer<typeof IntentLLMSchema>;

export interface IntentContext {
  previousTurn: ConversationTurn;
  ctx: PlannerContext;
}

export interface IntentClassifier {
  /**
   * Raw analysis of a follow-up message. Throws StageUnavailableError
   * after the retry is spent.
   */
  classifyIntent(text: string, context: IntentContext): Promise<IntentAnalysis>;
}

function describePreviousTurn(turn: ConversationTurn): string {
  const prev = turn.previousClassification;
  const places = turn.previousPlaces.map((p, i) => `${i + 1}. ${p.name}`).join('\n');
  return [
    `Previous request: ${turn.previousRequestText}`,
    `Parsed as: ${prev.count} ${prev.category} in ${prev.location}` +
      (prev.theme ? ` (${prev.theme})` : '') + `, ${prev.travelMode}`,
    places ? `Places shown:\n${places}` : 'Places shown: none'
  ].join('\n');
}

export class LlmIntentClassifier implements IntentClassifier {
  constructor(
    private readonly deps: LLMStageDeps,
    private readonly policy: RetryPolicy
  ) {}

  async classifyIntent(text: string, { previousTurn, ctx }: IntentContext): Promise<IntentAnalysis> {
    const messages: Message[] = [
      { role: 'system', content: ROUTER_SYSTEM_PROMPT },
      { role: 'user', content: `${describePreviousTurn(previousTurn)}\n\nNew message: ${text}` }
    ];

    return callStructuredStage(this.deps, this.policy, ctx, {
      stage: 'routing',
      purpose: 'routing',
      messages,
      schema: IntentLLMSchema,
      jsonSchema: ROUTER_JSON_SCHEMA,
      promptVersion: ROUTER_PROMPT_VERSION,
      schemaHash: ROUTER_SCHEMA_HASH
    });
  }
}
