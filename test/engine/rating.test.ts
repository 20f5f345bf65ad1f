import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  computeRatings,
  computeRatingsFor,
  expectedScore,
  playerNames,
  rankRatings,
  updatePair,
} from '../../src/engine/rating.js';
import type { MatchRecord } from '../../src/engine/types.js';

const contest = (player1: string, player2: string, result: 0 | 1): MatchRecord => ({ player1, player2, result });
const marker = (name: string): MatchRecord => ({ player1: name, player2: '', result: 0 });

const EPSILON = 1e-9;
const assertClose = (actual: number, expected: number, message?: string) =>
  assert.ok(Math.abs(actual - expected) < EPSILON, message ?? `expected ${actual} to be close to ${expected}`);

describe('expectedScore', () => {
  it('is one half for equal ratings', () => {
    assert.equal(expectedScore(1000, 1000), 0.5);
    assert.equal(expectedScore(1432.5, 1432.5), 0.5);
  });

  it('is about 0.909 for a 400 point edge', () => {
    assertClose(expectedScore(1400, 1000), 10 / 11);
    assertClose(expectedScore(1000, 1400), 1 / 11);
  });

  it('sums to one across both sides', () => {
    for (const [a, b] of [[1000, 1200], [873.4, 1511.9], [2000, 100]]) {
      assertClose(expectedScore(a, b) + expectedScore(b, a), 1);
    }
  });
});

describe('updatePair', () => {
  it('moves 16 points between equal players with K=32', () => {
    const update = updatePair(1000, 1000, 1);
    assert.equal(update.ratingA, 1016);
    assert.equal(update.ratingB, 984);
    assert.equal(update.expectedA, 0.5);
    assert.equal(update.expectedB, 0.5);
  });

  it('credits the second player when result is 0', () => {
    const update = updatePair(1000, 1000, 0);
    assert.equal(update.ratingA, 984);
    assert.equal(update.ratingB, 1016);
  });

  it('uses the given K-factor', () => {
    const update = updatePair(1000, 1000, 1, 10);
    assert.equal(update.ratingA, 1005);
    assert.equal(update.ratingB, 995);
  });

  it('transfers points without creating or destroying any', () => {
    const cases: Array<[number, number, 0 | 1]> = [
      [1000, 1000, 1],
      [1200, 950, 0],
      [1200, 950, 1],
      [812.25, 1633.5, 1],
    ];
    for (const [ra, rb, result] of cases) {
      const update = updatePair(ra, rb, result);
      assertClose(update.ratingA - ra, -(update.ratingB - rb), `zero-sum for ${ra}/${rb}/${result}`);
      assertClose(update.expectedA + update.expectedB, 1);
    }
  });
});

describe('computeRatings', () => {
  it('returns an empty mapping for an empty log', () => {
    assert.equal(computeRatings([]).size, 0);
  });

  it('seeds registered players at the initial rating', () => {
    const ratings = computeRatings([marker('carol'), marker('dave')]);
    assert.deepEqual([...ratings.entries()], [
      ['carol', 1000],
      ['dave', 1000],
    ]);
  });

  it('does not treat the empty opponent of a marker as a player', () => {
    assert.deepEqual([...playerNames([marker('carol')])], ['carol']);
  });

  it('ignores markers when replaying', () => {
    const withMarkers = computeRatings([marker('alice'), marker('bob'), contest('alice', 'bob', 1), marker('carol')]);
    const without = computeRatings([contest('alice', 'bob', 1)]);
    assert.equal(withMarkers.get('alice'), without.get('alice'));
    assert.equal(withMarkers.get('bob'), without.get('bob'));
    assert.equal(withMarkers.get('carol'), 1000);
  });

  it('replays every pair in the log, not only two players', () => {
    const history = [contest('alice', 'bob', 1), contest('bob', 'carol', 1)];
    const ratings = computeRatings(history);

    // bob at 984 beats carol at 1000
    const bobVsCarol = updatePair(984, 1000, 1);
    assert.equal(ratings.get('alice'), 1016);
    assert.equal(ratings.get('bob'), bobVsCarol.ratingA);
    assert.equal(ratings.get('carol'), bobVsCarol.ratingB);
    assert.ok((ratings.get('bob') ?? 0) > 1000);
    assert.ok((ratings.get('carol') ?? 0) < 984);
  });

  it('is deterministic', () => {
    const history = [
      contest('alice', 'bob', 1),
      contest('carol', 'alice', 1),
      marker('dave'),
      contest('dave', 'bob', 0),
      contest('alice', 'bob', 0),
    ];
    assert.deepEqual(computeRatings(history), computeRatings(history));
  });

  it('honours custom params', () => {
    const ratings = computeRatings([contest('alice', 'bob', 0)], { initialRating: 1500, kFactor: 20 });
    assert.equal(ratings.get('alice'), 1490);
    assert.equal(ratings.get('bob'), 1510);
  });

  it('returns the previous ratings after dropping the last record', () => {
    const base = [contest('alice', 'bob', 1), contest('carol', 'bob', 0), marker('dave')];
    for (const next of [contest('alice', 'carol', 0), contest('dave', 'alice', 1), marker('erin')]) {
      const appended = [...base, next];
      const undone = appended.slice(0, -1);
      assert.deepEqual(computeRatings(undone), computeRatings(base));
    }
  });
});

describe('computeRatingsFor', () => {
  it('defaults unseen players to the initial rating', () => {
    assert.deepEqual(computeRatingsFor([contest('alice', 'bob', 1)], 'alice', 'zoe'), [1016, 1000]);
    assert.deepEqual(computeRatingsFor([], 'x', 'y', { initialRating: 1200, kFactor: 32 }), [1200, 1200]);
  });
});

describe('rankRatings', () => {
  it('orders by rating then by name', () => {
    const ratings = new Map([
      ['dave', 1000],
      ['bob', 984],
      ['carol', 1000],
      ['alice', 1016],
    ]);
    assert.deepEqual(rankRatings(ratings), [
      { name: 'alice', rating: 1016 },
      { name: 'carol', rating: 1000 },
      { name: 'dave', rating: 1000 },
      { name: 'bob', rating: 984 },
    ]);
  });
});
