/**
 * Reply text for the chat surface
 */

import type { RoutePlan } from '../types.js';

export function formatPlaceList(plan: RoutePlan): string {
  return plan.points
    .map((place, index) => `${index + 1}. **${place.name}** - ${place.description}`)
    .join('\n');
}

export function formatRouteReply(plan: RoutePlan, shortfall = 0): string {
  if (plan.points.length === 0) {
    return `${plan.description} Try a different category or a nearby city.`;
  }

  const lines = [
    `Here is your ${plan.travelMode} route: **${plan.title}**`,
    '',
    formatPlaceList(plan),
    '',
    `Estimated time: ${plan.estimatedDuration}`
  ];

  if (shortfall > 0) {
    const missing = shortfall === 1 ? '1 place' : `${shortfall} places`;
    lines.push('', `I could only verify ${plan.points.length} of the requested stops; ${missing} could not be confirmed.`);
  }

  return lines.join('\n');
}
