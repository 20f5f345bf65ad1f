import { isMarker } from './engine/rating.js';
import type { MatchRecord, RankingEntry } from './engine/types.js';
import type { PlayerRatingChange } from './services/competition.js';

const RATING_WIDTH = 4;

export const formatDelta = (delta: number) => {
  const rounded = Math.round(delta);
  return rounded < 0 ? String(rounded) : `+${Math.abs(rounded)}`;
};

export const formatRanking = (entries: readonly RankingEntry[]): string[] => {
  const width = Math.max(0, ...entries.map((entry) => entry.name.length));
  return entries.map((entry) => `${entry.name.padEnd(width)} ${String(entry.rating).padStart(RATING_WIDTH)}`);
};

export const formatRatingChanges = (changes: readonly PlayerRatingChange[]): string[] => {
  const width = Math.max(0, ...changes.map((change) => change.name.length));
  return changes.map(
    (change) =>
      `${change.name.padEnd(width)} ${String(Math.round(change.after)).padStart(RATING_WIDTH)} (${formatDelta(change.delta)})`
  );
};

export const describeRecord = (record: MatchRecord) => {
  if (isMarker(record)) return `${record.player1} registered`;
  const winner = record.result === 1 ? record.player1 : record.player2;
  return `${record.player1} vs ${record.player2}: ${winner} won`;
};
