export type MatchResult = 0 | 1;

export interface MatchRecord {
  player1: string;
  // Empty for a registration marker.
  player2: string;
  result: MatchResult;
}

export interface RatingParams {
  initialRating: number;
  kFactor: number;
}

export type Ratings = Map<string, number>;

export interface PairUpdate {
  expectedA: number;
  expectedB: number;
  ratingA: number;
  ratingB: number;
}

export interface RankingEntry {
  name: string;
  rating: number;
}
