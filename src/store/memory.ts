import type { MatchRecord } from '../engine/types.js';
import type { MatchHistoryStore } from './types.js';
import { assertCompetitionName } from './helpers.js';

const copyHistory = (history: readonly MatchRecord[]) => history.map((record) => ({ ...record }));

export class MemoryHistoryStore implements MatchHistoryStore {
  private readonly logs = new Map<string, MatchRecord[]>();

  constructor(initial: Record<string, MatchRecord[]> = {}) {
    for (const [competition, history] of Object.entries(initial)) {
      this.logs.set(competition, copyHistory(history));
    }
  }

  async load(competition: string): Promise<MatchRecord[]> {
    assertCompetitionName(competition);
    return copyHistory(this.logs.get(competition) ?? []);
  }

  async save(competition: string, history: readonly MatchRecord[]): Promise<void> {
    assertCompetitionName(competition);
    this.logs.set(competition, copyHistory(history));
  }

  async list(): Promise<string[]> {
    return [...this.logs.keys()].sort((a, b) => a.localeCompare(b));
  }
}
