/**
 * Google Places (New) Text Search client
 * Implements PlacesLookup with one best-match Text Search per suggestion
 */

import { logger } from '../../../lib/logger/structured-logger.js';
import { fetchWithTimeout, UpstreamFetchError } from '../../../utils/fetch-with-timeout.js';
import { PLACES_API_BASE_URL, PLACES_FIELD_MASK, PLACES_LOOKUP_TIMEOUT_MS } from '../../../config/index.js';
import { mapGooglePlace, SearchTextResponseSchema } from './place-result.mapper.js';
import type { PlaceLookupOptions, PlaceMatch, PlacesLookup } from './places.types.js';

export interface GooglePlacesClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  languageCode?: string;
}

export class GooglePlacesClient implements PlacesLookup {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(private readonly options: GooglePlacesClientOptions) {
    if (!options.apiKey) {
      throw new Error('GOOGLE_API_KEY is required for the places client');
    }
    this.baseUrl = options.baseUrl ?? PLACES_API_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? PLACES_LOOKUP_TIMEOUT_MS;
  }

  async findBestMatch(name: string, localityHint: string, opts?: PlaceLookupOptions): Promise<PlaceMatch | null> {
    const url = `${this.baseUrl}/places:searchText`;
    const body = {
      textQuery: `${name}, ${localityHint}`,
      maxResultCount: 1,
      languageCode: this.options.languageCode ?? 'en'
    };

    const startTime = Date.now();
    const response = await fetchWithTimeout(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'X-Goog-Api-Key': this.options.apiKey,
        'X-Goog-FieldMask': PLACES_FIELD_MASK
      },
      body: JSON.stringify(body)
    }, {
      timeoutMs: this.timeoutMs,
      requestId: opts?.requestId,
      stage: 'resolve',
      provider: 'google_places',
      signal: opts?.signal
    });

    if (!response.ok) {
      const errorText = await response.text();
      logger.error({
        requestId: opts?.requestId,
        provider: 'google_places_new',
        providerMethod: 'searchText',
        status: response.status,
        errorBody: errorText.slice(0, 300),
        durationMs: Date.now() - startTime
      }, '[PLACES] Text Search failed');

      throw new UpstreamFetchError(
        `Google Places API error: ${response.status} ${response.statusText}`,
        'HTTP_ERROR',
        'google_places',
        new URL(url).host,
        response.status
      );
    }

    const json: unknown = await response.json();
    const parsed = SearchTextResponseSchema.parse(json);
    const first = parsed.places?.[0];
    const match = first ? mapGooglePlace(first) : null;

    logger.debug({
      requestId: opts?.requestId,
      provider: 'google_places_new',
      providerMethod: 'searchText',
      found: match !== null,
      durationMs: Date.now() - startTime
    }, '[PLACES] Text Search completed');

    return match;
  }
}
