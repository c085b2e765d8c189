/**
 * Places lookup seam
 * The resolver depends on this interface; tests pass in-process fakes.
 */

import type { Coordinates } from '../types.js';

export interface PlaceMatch {
  externalId: string;
  name: string;
  address: string;
  /** City reported by the service (null when it reports none) */
  locality: string | null;
  coordinates: Coordinates;
  rating: number | null;
  userRatingsTotal: number | null;
  photoReference: string | null;
  mapLink: string;
}

export interface PlaceLookupOptions {
  requestId?: string | undefined;
  signal?: AbortSignal | undefined;
}

export interface PlacesLookup {
  /**
   * Best match for `name` in `localityHint`, or null when nothing matches.
   * Throws on transport failure; zero matches is not a failure.
   */
  findBestMatch(name: string, localityHint: string, opts?: PlaceLookupOptions): Promise<PlaceMatch | null>;
}
