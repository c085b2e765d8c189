/**
 * SUGGEST Stage Prompt
 */

import { hashJsonSchema, type StructuredOutputSchema } from '../../../../llm/types.js';

export const SUGGEST_PROMPT_VERSION = 'suggest_v5';

export const SUGGEST_SYSTEM_PROMPT = `You recommend real, currently operating places for a city route. Return ONLY strict JSON.

Rules:
- Suggest exactly the requested number of places, all inside the requested city.
- Use the official name a maps service would know (no "the famous ...", no neighbourhood suffixes).
- Never suggest a place from the excluded list, under any spelling.
- Prefer places that are reasonably close to each other for the given travel mode.
- shortDescription: one sentence. whyRecommended: one sentence.
- routeDescription: 1-2 sentences about the route as a whole.
- estimatedDuration: total time for the route, e.g. "2-3 hours".
`;

export const SUGGEST_JSON_SCHEMA: StructuredOutputSchema = {
  name: 'place_suggestions',
  schema: {
    type: 'object',
    properties: {
      places: {
        type: 'array',
        items: {
          type: 'object',
          properties: {
            name: { type: 'string' },
            shortDescription: { type: 'string' },
            whyRecommended: { type: 'string' }
          },
          required: ['name', 'shortDescription', 'whyRecommended'],
          additionalProperties: false
        }
      },
      routeDescription: { type: 'string' },
      estimatedDuration: { type: 'string' }
    },
    required: ['places', 'routeDescription', 'estimatedDuration'],
    additionalProperties: false
  }
};

export const SUGGEST_SCHEMA_HASH = hashJsonSchema(SUGGEST_JSON_SCHEMA.schema);
