/**
 * Google Places (New) client tests
 * fetch is replaced in-process; nothing reaches the network.
 */

import { afterEach, describe, it, mock } from 'node:test';
import assert from 'node:assert/strict';
import { GooglePlacesClient } from '../google-places.client.js';
import { UpstreamFetchError } from '../../../../utils/fetch-with-timeout.js';

interface CapturedRequest {
  url: string;
  headers: Headers;
  body: unknown;
}

function stubFetch(status: number, payload: unknown): CapturedRequest[] {
  const captured: CapturedRequest[] = [];
  mock.method(globalThis, 'fetch', async (input: string | URL | Request, init?: RequestInit) => {
    captured.push({
      url: String(input),
      headers: new Headers(init?.headers),
      body: JSON.parse(String(init?.body))
    });
    return new Response(JSON.stringify(payload), {
      status,
      headers: { 'Content-Type': 'application/json' }
    });
  });
  return captured;
}

const hofbrauhaus = {
  id: 'ChIJ-hb',
  displayName: { text: 'Hofbräuhaus München', languageCode: 'de' },
  formattedAddress: 'Platzl 9, 80331 München, Germany',
  addressComponents: [
    { longText: '9', shortText: '9', types: ['street_number'] },
    { longText: 'München', shortText: 'München', types: ['locality', 'political'] },
    { longText: 'Germany', shortText: 'DE', types: ['country', 'political'] }
  ],
  location: { latitude: 48.1376, longitude: 11.5799 },
  rating: 4.4,
  userRatingCount: 80000,
  photos: [{ name: 'places/ChIJ-hb/photos/p1' }],
  googleMapsUri: 'https://maps.google.com/?cid=1'
};

describe('GooglePlacesClient', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('sends one Text Search with key, field mask and locality hint', async () => {
    const captured = stubFetch(200, { places: [hofbrauhaus] });
    const client = new GooglePlacesClient({ apiKey: 'test-key' });

    await client.findBestMatch('Hofbräuhaus', 'Munich');

    assert.equal(captured.length, 1);
    assert.equal(captured[0]?.url, 'https://places.googleapis.com/v1/places:searchText');
    assert.equal(captured[0]?.headers.get('X-Goog-Api-Key'), 'test-key');
    assert.ok(captured[0]?.headers.get('X-Goog-FieldMask')?.includes('places.addressComponents'));
    assert.deepEqual(captured[0]?.body, {
      textQuery: 'Hofbräuhaus, Munich',
      maxResultCount: 1,
      languageCode: 'en'
    });
  });

  it('maps the first result', async () => {
    stubFetch(200, { places: [hofbrauhaus] });
    const client = new GooglePlacesClient({ apiKey: 'test-key' });

    const match = await client.findBestMatch('Hofbräuhaus', 'Munich');

    assert.deepEqual(match, {
      externalId: 'ChIJ-hb',
      name: 'Hofbräuhaus München',
      address: 'Platzl 9, 80331 München, Germany',
      locality: 'München',
      coordinates: { lat: 48.1376, lng: 11.5799 },
      rating: 4.4,
      userRatingsTotal: 80000,
      photoReference: 'places/ChIJ-hb/photos/p1',
      mapLink: 'https://maps.google.com/?cid=1'
    });
  });

  it('strips resource prefixes and falls back to a place-id link', async () => {
    stubFetch(200, {
      places: [{
        id: 'places/ChIJ-x',
        displayName: { text: 'Bar X' },
        formattedAddress: 'Somewhere 1, London, UK',
        addressComponents: [{ longText: 'London', types: ['postal_town'] }],
        location: { latitude: 51.5, longitude: -0.12 }
      }]
    });
    const client = new GooglePlacesClient({ apiKey: 'test-key' });

    const match = await client.findBestMatch('Bar X', 'London');

    assert.equal(match?.externalId, 'ChIJ-x');
    assert.equal(match?.locality, 'London');
    assert.equal(match?.rating, null);
    assert.equal(match?.photoReference, null);
    assert.equal(match?.mapLink, 'https://www.google.com/maps/place/?q=place_id%3AChIJ-x');
  });

  it('returns null for zero matches', async () => {
    stubFetch(200, {});
    const client = new GooglePlacesClient({ apiKey: 'test-key' });

    assert.equal(await client.findBestMatch('Nowhere Bar', 'Munich'), null);
  });

  it('returns null for a result without coordinates', async () => {
    stubFetch(200, { places: [{ id: 'ChIJ-nl', displayName: { text: 'No Location' } }] });
    const client = new GooglePlacesClient({ apiKey: 'test-key' });

    assert.equal(await client.findBestMatch('No Location', 'Munich'), null);
  });

  it('throws an HTTP_ERROR on a non-2xx status', async () => {
    stubFetch(403, { error: { message: 'denied' } });
    const client = new GooglePlacesClient({ apiKey: 'test-key' });

    await assert.rejects(
      client.findBestMatch('Hofbräuhaus', 'Munich'),
      (error: unknown) =>
        error instanceof UpstreamFetchError &&
        error.errorKind === 'HTTP_ERROR' &&
        error.statusCode === 403
    );
  });

  it('requires an API key', () => {
    assert.throws(() => new GooglePlacesClient({ apiKey: '' }), /GOOGLE_API_KEY/);
  });
});
