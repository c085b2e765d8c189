/**
 * Route optimizer tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { orderPlaces } from '../route-optimizer.js';
import { DistanceCalculator } from '../distance-calculator.js';
import { makePlace } from '../../__tests__/fixtures.js';

const P1 = makePlace('p1', 48.137, 11.575);
const P2 = makePlace('p2', 48.150, 11.580);
const P3 = makePlace('p3', 48.138, 11.576);
const P4 = makePlace('p4', 48.160, 11.600);

const ids = (places: { externalId: string }[]) => places.map(p => p.externalId);

describe('DistanceCalculator', () => {
  const calc = new DistanceCalculator();

  it('returns 0 for the same point', () => {
    assert.equal(calc.haversine(48.137, 11.575, 48.137, 11.575), 0);
  });

  it('measures one degree of latitude as ~111.19 km', () => {
    const d = calc.haversine(0, 0, 1, 0);
    assert.ok(Math.abs(d - 111.19) < 0.01, `got ${d}`);
  });
});

describe('orderPlaces', () => {
  it('walks nearest-neighbour from the first place', () => {
    assert.deepEqual(ids(orderPlaces([P1, P2, P3, P4])), ['p1', 'p3', 'p2', 'p4']);
  });

  it('returns a permutation of the input', () => {
    const input = [P4, P1, P3, P2];
    const ordered = orderPlaces(input);
    assert.equal(ordered.length, input.length);
    assert.deepEqual([...ids(ordered)].sort(), ['p1', 'p2', 'p3', 'p4']);
  });

  it('starts at an anchor that is one of the places', () => {
    assert.deepEqual(ids(orderPlaces([P1, P2, P3, P4], P4)), ['p4', 'p2', 'p3', 'p1']);
  });

  it('treats an absent anchor as a virtual origin', () => {
    const anchor = { externalId: 'gone', coordinates: { lat: 48.151, lng: 11.581 } };
    assert.deepEqual(ids(orderPlaces([P1, P2, P3, P4], anchor)), ['p2', 'p3', 'p1', 'p4']);
  });

  it('breaks exact distance ties on the smaller externalId', () => {
    const centre = makePlace('c', 0, 2);
    const west = makePlace('d', 0, 1);
    const east = makePlace('b', 0, 3);
    assert.deepEqual(ids(orderPlaces([centre, west, east])), ['c', 'b', 'd']);
  });

  it('is deterministic', () => {
    const input = [P3, P4, P2, P1];
    assert.deepEqual(ids(orderPlaces(input)), ids(orderPlaces(input)));
  });

  it('handles empty and single inputs', () => {
    assert.deepEqual(orderPlaces([]), []);
    assert.deepEqual(ids(orderPlaces([P2])), ['p2']);
  });

  it('does not mutate the input', () => {
    const input = [P1, P2, P3, P4];
    orderPlaces(input, P4);
    assert.deepEqual(ids(input), ['p1', 'p2', 'p3', 'p4']);
  });
});
