/**
 * Google Maps URL builders
 * Directions links open in the Maps app; embed URLs feed an iframe and need a key.
 */

import type { Coordinates, ResolvedPlace, TravelMode } from '../types.js';

const MAPS_DIR_URL = 'https://www.google.com/maps/dir/';
const MAPS_PLACE_URL = 'https://www.google.com/maps/place/';
const MAPS_EMBED_URL = 'https://www.google.com/maps/embed/v1';

const PLACE_ZOOM = '15';

export function formatCoordinates({ lat, lng }: Coordinates): string {
  return `${lat},${lng}`;
}

/**
 * Fallback when the places service gives no maps URI
 */
export function buildPlaceLink(externalId: string): string {
  const params = new URLSearchParams({ q: `place_id:${externalId}` });
  return `${MAPS_PLACE_URL}?${params.toString()}`;
}

/**
 * Directions link through every point in order (first = origin, last = destination)
 */
export function buildDirectionsLink(points: readonly Pick<ResolvedPlace, 'coordinates'>[], travelMode: TravelMode): string {
  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last || points.length < 2) {
    return '';
  }

  const params = new URLSearchParams({
    api: '1',
    origin: formatCoordinates(first.coordinates),
    destination: formatCoordinates(last.coordinates),
    travelmode: travelMode
  });

  const waypoints = points.slice(1, -1).map(p => formatCoordinates(p.coordinates));
  if (waypoints.length > 0) {
    params.set('waypoints', waypoints.join('|'));
  }

  return `${MAPS_DIR_URL}?${params.toString()}`;
}

/**
 * Maps Embed directions URL; empty without a key
 */
export function buildEmbedDirectionsUrl(
  points: readonly Pick<ResolvedPlace, 'coordinates'>[],
  travelMode: TravelMode,
  apiKey: string
): string {
  const first = points[0];
  const last = points[points.length - 1];
  if (!apiKey || !first || !last || points.length < 2) {
    return '';
  }

  const params = new URLSearchParams({
    key: apiKey,
    origin: formatCoordinates(first.coordinates),
    destination: formatCoordinates(last.coordinates),
    mode: travelMode
  });

  const waypoints = points.slice(1, -1).map(p => formatCoordinates(p.coordinates));
  if (waypoints.length > 0) {
    params.set('waypoints', waypoints.join('|'));
  }

  return `${MAPS_EMBED_URL}/directions?${params.toString()}`;
}

/**
 * Maps Embed URL centred on a single place; empty without a key
 */
export function buildEmbedPlaceUrl(place: Pick<ResolvedPlace, 'name' | 'coordinates'>, apiKey: string): string {
  if (!apiKey) {
    return '';
  }

  const params = new URLSearchParams({
    key: apiKey,
    q: place.name,
    center: formatCoordinates(place.coordinates),
    zoom: PLACE_ZOOM
  });

  return `${MAPS_EMBED_URL}/place?${params.toString()}`;
}
