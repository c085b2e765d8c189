/**
 * Route Optimizer
 *
 * Greedy nearest-neighbour ordering over haversine distance. A heuristic,
 * not an optimal tour: O(n^2), deterministic, meant for n <= 10.
 */

import type { Coordinates, ResolvedPlace } from '../types.js';
import { distanceCalculator } from './distance-calculator.js';

export type RouteAnchor = Pick<ResolvedPlace, 'externalId' | 'coordinates'>;

/**
 * Exact distance ties go to the lexicographically smaller externalId
 */
function isCloser(candidate: ResolvedPlace, distance: number, best: ResolvedPlace | null, bestDistance: number): boolean {
  if (!best) return true;
  if (distance < bestDistance) return true;
  return distance === bestDistance && candidate.externalId < best.externalId;
}

function nearestTo(origin: Coordinates, remaining: readonly ResolvedPlace[]): number {
  let bestIndex = -1;
  let best: ResolvedPlace | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;

  remaining.forEach((place, index) => {
    const distance = distanceCalculator.between(origin, place.coordinates);
    if (isCloser(place, distance, best, bestDistance)) {
      best = place;
      bestDistance = distance;
      bestIndex = index;
    }
  });

  return bestIndex;
}

/**
 * Order places into a travel-efficient sequence.
 *
 * Starts at the anchor when it is one of the places; an anchor that is not
 * in the input is a virtual origin (the route starts at the place nearest to
 * it). Without an anchor the first input place starts the route.
 *
 * @returns a permutation of `places`
 */
export function orderPlaces(places: readonly ResolvedPlace[], anchor?: RouteAnchor | null): ResolvedPlace[] {
  if (places.length <= 1) {
    return [...places];
  }

  const remaining = [...places];
  const ordered: ResolvedPlace[] = [];

  let startIndex = 0;
  if (anchor) {
    const anchorIndex = remaining.findIndex(p => p.externalId === anchor.externalId);
    startIndex = anchorIndex >= 0 ? anchorIndex : nearestTo(anchor.coordinates, remaining);
  }

  let [current] = remaining.splice(startIndex, 1);
  while (current) {
    ordered.push(current);
    if (remaining.length === 0) break;
    const nextIndex = nearestTo(current.coordinates, remaining);
    [current] = remaining.splice(nextIndex, 1);
  }

  return ordered;
}

/**
 * Total path length in kilometers (diagnostics only)
 */
export function routeLengthKm(ordered: readonly ResolvedPlace[]): number {
  let total = 0;
  for (let i = 1; i < ordered.length; i++) {
    const from = ordered[i - 1];
    const to = ordered[i];
    if (from && to) {
      total += distanceCalculator.between(from.coordinates, to.coordinates);
    }
  }
  return total;
}
