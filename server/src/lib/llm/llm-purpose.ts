/**
 * LLM Purpose Types
 *
 * Distinct purposes for LLM calls in the planner pipeline.
 * Each purpose can have its own model and timeout configuration.
 */

export type LLMPurpose =
  | 'routing'    // Context router - new request vs. modification of the previous turn
  | 'classify'   // Query classifier - location/category/count/theme/travel mode
  | 'suggest';   // Place suggestion generator

export const LLM_PURPOSES: readonly LLMPurpose[] = ['routing', 'classify', 'suggest'];
