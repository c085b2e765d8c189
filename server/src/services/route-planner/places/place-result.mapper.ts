/**
 * Google Places (New) Result Mapper
 *
 * Text Search response shape (fields requested by PLACES_FIELD_MASK):
 * {
 *   id: "ChIJ...",
 *   displayName: { text: "...", languageCode: "..." },
 *   formattedAddress: "...",
 *   addressComponents: [{ longText, shortText, types: ["locality", ...] }],
 *   location: { latitude, longitude },
 *   rating, userRatingCount,
 *   photos: [{ name: "places/.../photos/..." }],
 *   googleMapsUri: "..."
 * }
 */

import { z } from 'zod';
import { buildPlaceLink } from '../response/maps-links.js';
import type { PlaceMatch } from './places.types.js';

const AddressComponentSchema = z.object({
  longText: z.string().optional(),
  shortText: z.string().optional(),
  types: z.array(z.string()).default([])
});

export const GooglePlaceSchema = z.object({
  id: z.string(),
  displayName: z.object({ text: z.string() }).optional(),
  formattedAddress: z.string().optional(),
  addressComponents: z.array(AddressComponentSchema).optional(),
  location: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
  rating: z.number().optional(),
  userRatingCount: z.number().int().optional(),
  photos: z.array(z.object({ name: z.string() })).optional(),
  googleMapsUri: z.string().optional()
});

export const SearchTextResponseSchema = z.object({
  places: z.array(GooglePlaceSchema).optional()
});

export type GooglePlace = z.infer<typeof GooglePlaceSchema>;

// postal_town covers UK addresses without a locality component
const LOCALITY_TYPES = ['locality', 'postal_town'] as const;

function extractLocality(place: GooglePlace): string | null {
  for (const type of LOCALITY_TYPES) {
    const component = place.addressComponents?.find(c => c.types.includes(type));
    const text = component?.longText ?? component?.shortText;
    if (text) return text;
  }
  return null;
}

/**
 * Map a Places (New) result; null when it has no coordinates
 */
export function mapGooglePlace(place: GooglePlace): PlaceMatch | null {
  if (!place.location) {
    return null;
  }

  // Resource names come as "places/ChIJxxx" in some responses
  const placeId = place.id.split('/').pop() || place.id;

  return {
    externalId: placeId,
    name: place.displayName?.text ?? placeId,
    address: place.formattedAddress ?? '',
    locality: extractLocality(place),
    coordinates: {
      lat: place.location.latitude,
      lng: place.location.longitude
    },
    rating: place.rating ?? null,
    userRatingsTotal: place.userRatingCount ?? null,
    // Reference only, no key; clients fetch photos through their own proxy
    photoReference: place.photos?.[0]?.name ?? null,
    mapLink: place.googleMapsUri || buildPlaceLink(placeId)
  };
}
