import type { RatingParams } from './types.js';

export const DEFAULT_PARAMS: RatingParams = {
  initialRating: 1000,
  kFactor: 32,
};
