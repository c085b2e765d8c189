/**
 * CLASSIFY Stage Prompt
 */

import { hashJsonSchema, type StructuredOutputSchema } from '../../../../llm/types.js';

export const CLASSIFY_PROMPT_VERSION = 'classify_v3';

export const CLASSIFY_SYSTEM_PROMPT = `You are a query classifier for a city route planner. Return ONLY strict JSON.

Decide whether the message asks for places to visit or a route between places.
If it does, extract:
- location: the city, ALWAYS in English ("Мюнхен" -> "Munich", "Lisboa" -> "Lisbon")
- category: plural kind of place ("bars", "museums", "parks", "coffee shops")
- count: the exact number the user asked for, even above 10. "best"/"top" without a number -> 3; "tour" without a number -> 5; otherwise 5
- theme: extra preference ("modern art", "rooftop", "for kids") or null
- travelMode: "walking" | "driving" | "transit", or null if the user did not say

If the message refines an earlier request (shown as prior turn), carry over whatever it does not change:
"can you choose 3 parks for 2 hours?" after "5 parks in Paris" -> location="Paris", category="parks", count=3.

If it is NOT a place/route request (weather, small talk, general questions): isRouteRequest=false, fill the other fields with "" / 0 / null and explain in reasoning.

Examples:
"Top 5 bars in Munich" -> {"isRouteRequest":true,"location":"Munich","category":"bars","count":5,"theme":null,"travelMode":null,"reasoning":"bar list in a city"}
"3 modern art museums in Berlin, walking" -> {"isRouteRequest":true,"location":"Berlin","category":"museums","count":3,"theme":"modern art","travelMode":"walking","reasoning":"museum route with theme"}
"How's the weather?" -> {"isRouteRequest":false,"location":"","category":"","count":0,"theme":null,"travelMode":null,"reasoning":"weather question"}
`;

export const CLASSIFY_JSON_SCHEMA: StructuredOutputSchema = {
  name: 'query_classification',
  schema: {
    type: 'object',
    properties: {
      isRouteRequest: { type: 'boolean' },
      location: { type: 'string' },
      category: { type: 'string' },
      count: { type: 'integer' },
      theme: { type: ['string', 'null'] },
      travelMode: { type: ['string', 'null'] },
      reasoning: { type: 'string' }
    },
    required: ['isRouteRequest', 'location', 'category', 'count', 'theme', 'travelMode', 'reasoning'],
    additionalProperties: false
  }
};

export const CLASSIFY_SCHEMA_HASH = hashJsonSchema(CLASSIFY_JSON_SCHEMA.schema);
