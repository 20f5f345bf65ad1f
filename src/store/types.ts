import type { MatchRecord } from '../engine/types.js';

export interface MatchHistoryStore {
  load(competition: string): Promise<MatchRecord[]>;
  // Replaces the whole log.
  save(competition: string, history: readonly MatchRecord[]): Promise<void>;
  list(): Promise<string[]>;
}

export * from './errors.js';
