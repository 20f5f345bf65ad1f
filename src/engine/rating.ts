import { DEFAULT_PARAMS } from './params.js';
import type { MatchRecord, MatchResult, PairUpdate, RankingEntry, RatingParams, Ratings } from './types.js';

export const isMarker = (record: MatchRecord) => record.player2 === '';

const compareNames = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export const playerNames = (history: readonly MatchRecord[]): Set<string> => {
  const names = new Set<string>();
  for (const record of history) {
    names.add(record.player1);
    if (!isMarker(record)) names.add(record.player2);
  }
  return names;
};

export function expectedScore(ratingA: number, ratingB: number) {
  return 1 / (1 + 10 ** ((ratingB - ratingA) / 400));
}

export function updatePair(
  ratingA: number,
  ratingB: number,
  result: MatchResult,
  kFactor = DEFAULT_PARAMS.kFactor
): PairUpdate {
  const expectedA = expectedScore(ratingA, ratingB);
  const expectedB = 1 - expectedA;
  return {
    expectedA,
    expectedB,
    ratingA: ratingA + kFactor * (result - expectedA),
    ratingB: ratingB + kFactor * ((1 - result) - expectedB),
  };
}

/**
 * Replays a competition log from scratch. Every player seen anywhere in the
 * log starts at the initial rating; contest records are applied in order and
 * registration markers only contribute their name.
 */
export function computeRatings(history: readonly MatchRecord[], params: RatingParams = DEFAULT_PARAMS): Ratings {
  const ratings: Ratings = new Map();
  for (const name of playerNames(history)) {
    ratings.set(name, params.initialRating);
  }

  for (const record of history) {
    if (isMarker(record)) continue;
    const update = updatePair(
      ratings.get(record.player1) ?? params.initialRating,
      ratings.get(record.player2) ?? params.initialRating,
      record.result,
      params.kFactor
    );
    ratings.set(record.player1, update.ratingA);
    ratings.set(record.player2, update.ratingB);
  }

  return ratings;
}

export function computeRatingsFor(
  history: readonly MatchRecord[],
  nameA: string,
  nameB: string,
  params: RatingParams = DEFAULT_PARAMS
): [number, number] {
  const ratings = computeRatings(history, params);
  return [ratings.get(nameA) ?? params.initialRating, ratings.get(nameB) ?? params.initialRating];
}

// Highest rating first; equal ratings fall back to name order.
export const rankRatings = (ratings: Ratings): RankingEntry[] =>
  [...ratings.entries()]
    .map(([name, rating]) => ({ name, rating }))
    .sort((a, b) => b.rating - a.rating || compareNames(a.name, b.name));
