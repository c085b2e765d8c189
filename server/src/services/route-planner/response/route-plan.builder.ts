/**
 * Response Assembler
 * Pure mapping from ordered places to a RoutePlan
 */

import { DEFAULT_ESTIMATED_DURATION } from '../../../config/index.js';
import type { QueryClassification, ResolvedPlace, RoutePlan, RouteSegment } from '../types.js';
import {
  buildDirectionsLink,
  buildEmbedDirectionsUrl,
  buildEmbedPlaceUrl
} from './maps-links.js';

export interface AssembleOptions {
  /** Model-written overview from the suggestion batch, if any */
  routeDescription?: string | undefined;
  estimatedDuration?: string | undefined;
  mapsEmbedApiKey?: string | undefined;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function buildRouteTitle(classification: QueryClassification): string {
  const base = `${capitalize(classification.category)} in ${classification.location}`;
  return classification.theme ? `${base}: ${classification.theme}` : base;
}

function buildDescription(points: readonly ResolvedPlace[], classification: QueryClassification, routeDescription?: string): string {
  if (points.length === 0) {
    return `No verified ${classification.category} could be found in ${classification.location}.`;
  }
  const overview = routeDescription?.trim();
  if (overview) {
    return overview;
  }
  const stops = points.length === 1 ? '1 stop' : `${points.length} stops`;
  return `A ${classification.travelMode} route through ${classification.location} with ${stops}.`;
}

function buildSegments(points: readonly ResolvedPlace[], classification: QueryClassification, embedKey: string): RouteSegment[] {
  const segments: RouteSegment[] = [];
  for (let i = 1; i < points.length; i++) {
    const from = points[i - 1];
    const to = points[i];
    if (!from || !to) continue;
    const pair = [from, to];
    segments.push({
      from,
      to,
      directionsLink: buildDirectionsLink(pair, classification.travelMode),
      embedUrl: buildEmbedDirectionsUrl(pair, classification.travelMode, embedKey)
    });
  }
  return segments;
}

/**
 * Assemble the plan. Empty input yields an empty-route plan (no links,
 * no segments) rather than an error.
 */
export function assembleRoutePlan(
  orderedPlaces: readonly ResolvedPlace[],
  classification: QueryClassification,
  options: AssembleOptions = {}
): RoutePlan {
  const embedKey = options.mapsEmbedApiKey ?? '';
  const points = [...orderedPlaces];

  let fullRouteLink = '';
  let fullRouteMapUrl = '';
  const [only] = points;
  if (points.length === 1 && only) {
    fullRouteLink = only.mapLink;
    fullRouteMapUrl = buildEmbedPlaceUrl(only, embedKey) || only.mapLink;
  } else if (points.length > 1) {
    fullRouteLink = buildDirectionsLink(points, classification.travelMode);
    fullRouteMapUrl = buildEmbedDirectionsUrl(points, classification.travelMode, embedKey) || fullRouteLink;
  }

  return {
    title: buildRouteTitle(classification),
    description: buildDescription(points, classification, options.routeDescription),
    estimatedDuration: options.estimatedDuration?.trim() || DEFAULT_ESTIMATED_DURATION,
    travelMode: classification.travelMode,
    points,
    segments: buildSegments(points, classification, embedKey),
    fullRouteMapUrl,
    fullRouteLink
  };
}
