/**
 * ROUTING Stage Prompt
 */

import { hashJsonSchema, type StructuredOutputSchema } from '../../../../llm/types.js';

export const ROUTER_PROMPT_VERSION = 'router_v4';

export const ROUTER_SYSTEM_PROMPT = `You route follow-up messages for a city route planner. Return ONLY strict JSON.

INPUT: the previous request, its place list, and the new message.

Pick operationType:
- "new": a different request (other city AND other kind of place, or clearly unrelated to the list)
- "add": more places of the same kind ("add 2 more", "one more bar", "добавь ещё")
- "remove": drop places ("remove the last one", "delete 2", "remove the first and third")
- "replace_last": swap only the last place ("the last one is too far", "change the last bar")
- "replace_all": the user rejects the whole list ("I don't like any of these", "give me different ones")
- "refine": same request with changed parameters ("make it 3 parks for 2 hours", "by car instead")

Fields:
- mentionedLocation: city named in the new message (English), or null
- mentionedCategory: kind of place named in the new message (plural), or null
- locationChanged / categoryChanged: true only if the new message names a different one than before
- countAdjustment: N as a positive integer for add/remove ("2 more" -> 2); 0 when no number is given
- removePositions: 1-based positions named for removal ("the first and third" -> [1,3]); [] otherwise
- negatesAllPrevious: true only if the user explicitly rejects ALL previous places
- reasoning: one short sentence

When unsure between "add" and "replace_all", choose "add" unless the user explicitly rejects all previous places.
`;

export const ROUTER_JSON_SCHEMA: StructuredOutputSchema = {
  name: 'routing_decision',
  schema: {
    type: 'object',
    properties: {
      operationType: {
        type: 'string',
        enum: ['new', 'add', 'remove', 'replace_last', 'replace_all', 'refine']
      },
      mentionedLocation: { type: ['string', 'null'] },
      mentionedCategory: { type: ['string', 'null'] },
      locationChanged: { type: 'boolean' },
      categoryChanged: { type: 'boolean' },
      countAdjustment: { type: 'integer' },
      removePositions: { type: 'array', items: { type: 'integer' } },
      negatesAllPrevious: { type: 'boolean' },
      reasoning: { type: 'string' }
    },
    required: [
      'operationType',
      'mentionedLocation',
      'mentionedCategory',
      'locationChanged',
      'categoryChanged',
      'countAdjustment',
      'removePositions',
      'negatesAllPrevious',
      'reasoning'
    ],
    additionalProperties: false
  }
};

export const ROUTER_SCHEMA_HASH = hashJsonSchema(ROUTER_JSON_SCHEMA.schema);
