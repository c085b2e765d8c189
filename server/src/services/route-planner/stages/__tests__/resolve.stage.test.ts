/**
 * Place resolver tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PlaceResolver, type ResolveRequest } from '../resolve/resolve.stage.js';
import { RequestAbortedError } from '../../../../lib/reliability/abort-guard.js';
import type { PlaceMatch, PlacesLookup } from '../../places/places.types.js';
import {
  batchOf,
  createContext,
  FakePlacesLookup,
  FakeSuggester,
  makeClassification,
  makeMatch,
  suggestion,
  TEST_CONFIG
} from '../../__tests__/fixtures.js';

function request(names: string[], overrides: Partial<ResolveRequest> = {}): ResolveRequest {
  return {
    suggestions: names.map(suggestion),
    classification: makeClassification(),
    operationType: 'new',
    countNeeded: names.length,
    ...overrides
  };
}

const munich = (id: string, name: string, offset = 0) => makeMatch(id, name, 48.13 + offset, 11.57 + offset);
const augsburg = (id: string, name: string) => makeMatch(id, name, 48.37, 10.89, 'Augsburg');

describe('PlaceResolver', () => {
  it('backfills locality mismatches with a retry round', async () => {
    const places = new FakePlacesLookup({
      'Bar 1': munich('id1', 'Bar 1', 0.001),
      'Bar 2': augsburg('id2', 'Bar 2'),
      'Bar 3': munich('id3', 'Bar 3', 0.002),
      'Bar 4': augsburg('id4', 'Bar 4'),
      'Bar 5': munich('id5', 'Bar 5', 0.003),
      'Bar 6': munich('id6', 'Bar 6', 0.004),
      'Bar 7': munich('id7', 'Bar 7', 0.005)
    });
    const suggester = new FakeSuggester([batchOf(['Bar 6', 'Bar 7'])]);
    const resolver = new PlaceResolver(places, suggester, TEST_CONFIG);

    const result = await resolver.resolve(request(['Bar 1', 'Bar 2', 'Bar 3', 'Bar 4', 'Bar 5']), createContext());

    assert.deepEqual(result.places.map(p => p.externalId), ['id1', 'id3', 'id5', 'id6', 'id7']);
    assert.equal(result.shortfall, 0);
    assert.equal(result.rounds, 1);
    assert.deepEqual(result.rejected.map(r => [r.name, r.reason]), [
      ['Bar 2', 'locality_mismatch'],
      ['Bar 4', 'locality_mismatch']
    ]);

    const replacementRequest = suggester.requests[0];
    assert.equal(replacementRequest?.countNeeded, 2);
    assert.deepEqual(replacementRequest?.excludedNames, ['Bar 1', 'Bar 2', 'Bar 3', 'Bar 4', 'Bar 5']);
  });

  it('never re-queries a mismatched place', async () => {
    const places = new FakePlacesLookup({
      'Bar 1': augsburg('id1', 'Bar 1'),
      'Bar 2': munich('id2', 'Bar 2')
    });
    const resolver = new PlaceResolver(places, new FakeSuggester([batchOf(['Bar 2'])]), TEST_CONFIG);

    await resolver.resolve(request(['Bar 1']), createContext());

    assert.deepEqual(places.calls.map(c => c.name), ['Bar 1', 'Bar 2']);
    assert.ok(places.calls.every(c => c.localityHint === 'Munich'));
  });

  it('rejects a place whose street merely carries the city name', async () => {
    const places = new FakePlacesLookup({
      'Stube Dachau': { ...makeMatch('d1', 'Stube Dachau', 48.26, 11.43, 'Dachau'), address: 'Münchner Straße 12, 85221 Dachau, Germany' },
      'Munich Road Pub': { ...makeMatch('b1', 'Munich Road Pub', 52.47, 13.4, 'Berlin'), address: 'Munich Road 3, 10115 Berlin, Germany' }
    });
    const resolver = new PlaceResolver(places, new FakeSuggester([]), TEST_CONFIG);

    const result = await resolver.resolve(request(['Stube Dachau', 'Munich Road Pub']), createContext());

    assert.deepEqual(result.places, []);
    assert.deepEqual(result.rejected.map(r => [r.name, r.reason]), [
      ['Stube Dachau', 'locality_mismatch'],
      ['Munich Road Pub', 'locality_mismatch']
    ]);
    assert.equal(result.shortfall, 2);
  });

  it('rejects duplicate ids, including carried-over points', async () => {
    const places = new FakePlacesLookup({
      'Bar 1': munich('id1', 'Bar 1'),
      'Bar One': munich('id1', 'Bar 1'),
      'Carried Twin': munich('carried', 'Carried Bar')
    });
    const resolver = new PlaceResolver(places, new FakeSuggester([]), TEST_CONFIG);

    const result = await resolver.resolve(request(['Bar 1', 'Bar One', 'Carried Twin'], {
      excludedIds: ['carried']
    }), createContext());

    assert.deepEqual(result.places.map(p => p.externalId), ['id1']);
    assert.deepEqual(result.rejected.map(r => r.reason), ['duplicate', 'duplicate']);
    assert.equal(result.shortfall, 2);
  });

  it('stops after the retry budget and reports the shortfall', async () => {
    const places = new FakePlacesLookup({
      'Bar 1': munich('id1', 'Bar 1'),
      'Far 1': augsburg('f1', 'Far 1'),
      'Far 2': augsburg('f2', 'Far 2'),
      'Far 3': augsburg('f3', 'Far 3'),
      'Far 4': augsburg('f4', 'Far 4')
    });
    const suggester = new FakeSuggester([
      batchOf(['Far 2']),
      batchOf(['Far 3']),
      batchOf(['Far 4']),
      batchOf(['Bar 9'])
    ]);
    const resolver = new PlaceResolver(places, suggester, TEST_CONFIG);

    const result = await resolver.resolve(request(['Bar 1', 'Far 1']), createContext());

    assert.equal(suggester.requests.length, 3);
    assert.equal(result.rounds, 3);
    assert.deepEqual(result.places.map(p => p.externalId), ['id1']);
    assert.equal(result.shortfall, 1);
    assert.deepEqual(suggester.requests[2]?.excludedNames, ['Bar 1', 'Far 1', 'Far 2', 'Far 3']);
  });

  it('retries a failed lookup once, then counts it as failed', async () => {
    const places = new FakePlacesLookup({
      'Bar 1': [new Error('Google Places API error: 503'), munich('id1', 'Bar 1')],
      'Bar 2': [new Error('fetch failed'), new Error('fetch failed')]
    });
    const resolver = new PlaceResolver(places, new FakeSuggester([]), TEST_CONFIG);

    const result = await resolver.resolve(request(['Bar 1', 'Bar 2']), createContext());

    assert.deepEqual(result.places.map(p => p.externalId), ['id1']);
    assert.equal(places.calls.filter(c => c.name === 'Bar 2').length, 2);
    assert.deepEqual(result.rejected.map(r => [r.name, r.reason, r.detail]), [['Bar 2', 'lookup_failed', 'fetch failed']]);
    assert.equal(result.shortfall, 1);
  });

  it('records places the service cannot find', async () => {
    const places = new FakePlacesLookup({ 'Bar 1': munich('id1', 'Bar 1') });
    const resolver = new PlaceResolver(places, new FakeSuggester([]), TEST_CONFIG);

    const result = await resolver.resolve(request(['Bar 1', 'Ghost Bar']), createContext());

    assert.deepEqual(result.rejected.map(r => [r.name, r.reason]), [['Ghost Bar', 'not_found']]);
  });

  it('ends the retry loop when replacement suggestions fail', async () => {
    const places = new FakePlacesLookup({ 'Bar 1': munich('id1', 'Bar 1') });
    const suggester = new FakeSuggester([new Error('suggest unavailable')]);
    const resolver = new PlaceResolver(places, suggester, TEST_CONFIG);

    const result = await resolver.resolve(request(['Bar 1', 'Ghost Bar']), createContext());

    assert.equal(suggester.requests.length, 1);
    assert.equal(result.rounds, 1);
    assert.deepEqual(result.places.map(p => p.externalId), ['id1']);
    assert.equal(result.shortfall, 1);
  });

  it('copies the suggestion description onto the resolved place', async () => {
    const places = new FakePlacesLookup({ 'Bar 1': munich('id1', 'Bar 1') });
    const resolver = new PlaceResolver(places, new FakeSuggester([]), TEST_CONFIG);

    const result = await resolver.resolve(request(['Bar 1']), createContext());

    assert.equal(result.places[0]?.description, 'Bar 1 is nice');
    assert.equal(result.places[0]?.mapLink, 'https://maps.google.com/?cid=id1');
  });

  it('caps concurrent lookups', async () => {
    let active = 0;
    let maxActive = 0;
    const slow: PlacesLookup = {
      async findBestMatch(name: string): Promise<PlaceMatch | null> {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise(resolve => setTimeout(resolve, 5));
        active--;
        return munich(`id-${name}`, name);
      }
    };
    const resolver = new PlaceResolver(slow, new FakeSuggester([]), { ...TEST_CONFIG, lookupConcurrency: 2 });

    const result = await resolver.resolve(request(['A', 'B', 'C', 'D', 'E']), createContext());

    assert.equal(result.places.length, 5);
    assert.equal(maxActive, 2);
  });

  it('stops when the request is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const places = new FakePlacesLookup({ 'Bar 1': munich('id1', 'Bar 1') });
    const resolver = new PlaceResolver(places, new FakeSuggester([]), TEST_CONFIG);

    await assert.rejects(
      resolver.resolve(request(['Bar 1']), createContext({ abortSignal: controller.signal })),
      RequestAbortedError
    );
    assert.equal(places.calls.length, 0);
  });
});
