/**
 * Run a conversation through the real services and print each outcome
 *
 * Usage: npm run plan -- "Top 5 bars in Munich" "add 2 more"
 * Needs OPENAI_API_KEY and GOOGLE_API_KEY.
 */

import 'dotenv/config';
import { createRoutePlanner, toConversationTurn } from '../src/index.js';
import type { ConversationTurn } from '../src/index.js';

async function main() {
  const messages = process.argv.slice(2);
  if (messages.length === 0) {
    console.error('Usage: plan-route.ts "<message>" ["<follow-up>" ...]');
    process.exitCode = 1;
    return;
  }

  const planner = createRoutePlanner();
  let turn: ConversationTurn | null = null;

  for (const message of messages) {
    console.log(`\n> ${message}`);
    const outcome = await planner.handleMessage(message, turn);

    if (outcome.kind === 'ABORTED') {
      console.log(`[aborted during ${outcome.stage}]`);
      continue;
    }

    console.log(outcome.message);
    if (outcome.kind === 'ROUTE_PLAN' || outcome.kind === 'PARTIAL_ROUTE_PLAN') {
      console.log(`\nRoute: ${outcome.plan.fullRouteLink}`);
    }

    turn = toConversationTurn(message, outcome, turn);
  }
}

main().catch((error: unknown) => {
  console.error('[plan-route] Failed:', error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
