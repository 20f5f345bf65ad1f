import { DEFAULT_PARAMS } from '../engine/params.js';
import { computeRatings, computeRatingsFor, playerNames, rankRatings, updatePair } from '../engine/rating.js';
import type { MatchRecord, MatchResult, RankingEntry, RatingParams } from '../engine/types.js';
import { FALLBACK_COMPETITION } from '../config/env.js';
import { getDefaultCompetition, type ConfigStore } from '../config/store.js';
import { InvalidMatchError } from '../store/errors.js';
import { assertCompetitionName, assertPlayerName } from '../store/helpers.js';
import type { MatchHistoryStore } from '../store/types.js';

export interface CompetitionServiceDeps {
  history: MatchHistoryStore;
  config: ConfigStore;
  params?: RatingParams;
  fallbackCompetition?: string;
}

export interface PlayerRatingChange {
  name: string;
  before: number;
  after: number;
  delta: number;
  expected: number;
}

export interface RecordMatchResult {
  competition: string;
  players: [PlayerRatingChange, PlayerRatingChange];
  registered: string[];
}

const markerFor = (name: string): MatchRecord => ({ player1: name, player2: '', result: 0 });

export class CompetitionService {
  private readonly history: MatchHistoryStore;
  private readonly config: ConfigStore;
  readonly params: RatingParams;
  private readonly fallbackCompetition: string;

  constructor(deps: CompetitionServiceDeps) {
    this.history = deps.history;
    this.config = deps.config;
    this.params = deps.params ?? DEFAULT_PARAMS;
    this.fallbackCompetition = deps.fallbackCompetition ?? FALLBACK_COMPETITION;
  }

  async registerPlayer(competition: string, name: string): Promise<boolean> {
    assertPlayerName(name);
    const history = await this.history.load(competition);
    if (playerNames(history).has(name)) return false;
    history.push(markerFor(name));
    await this.history.save(competition, history);
    return true;
  }

  /**
   * Appends a contest record, registering either player first if the log has
   * never seen them. Returned ratings come from replaying the full log as it
   * was loaded, then applying this one result.
   */
  async recordMatch(competition: string, name1: string, name2: string, result: MatchResult): Promise<RecordMatchResult> {
    assertPlayerName(name1);
    assertPlayerName(name2);
    if (name1 === name2) {
      throw new InvalidMatchError(`a player cannot play against themselves (${name1})`);
    }

    const history = await this.history.load(competition);
    const known = playerNames(history);
    const [ratingA, ratingB] = computeRatingsFor(history, name1, name2, this.params);
    const update = updatePair(ratingA, ratingB, result, this.params.kFactor);

    const registered = [name1, name2].filter((name) => !known.has(name));
    for (const name of registered) {
      history.push(markerFor(name));
    }
    history.push({ player1: name1, player2: name2, result });
    await this.history.save(competition, history);

    return {
      competition,
      registered,
      players: [
        { name: name1, before: ratingA, after: update.ratingA, delta: update.ratingA - ratingA, expected: update.expectedA },
        { name: name2, before: ratingB, after: update.ratingB, delta: update.ratingB - ratingB, expected: update.expectedB },
      ],
    };
  }

  async undoLastMatch(competition: string): Promise<MatchRecord | null> {
    const history = await this.history.load(competition);
    const removed = history.pop();
    if (!removed) return null;
    await this.history.save(competition, history);
    return removed;
  }

  async listRanking(competition: string): Promise<RankingEntry[]> {
    const history = await this.history.load(competition);
    return rankRatings(computeRatings(history, this.params)).map((entry) => ({
      name: entry.name,
      rating: Math.round(entry.rating),
    }));
  }

  async getHistory(competition: string): Promise<MatchRecord[]> {
    return this.history.load(competition);
  }

  async listCompetitions(): Promise<string[]> {
    return this.history.list();
  }

  async getActiveCompetition(): Promise<string> {
    const config = await this.config.load();
    return getDefaultCompetition(config, this.fallbackCompetition);
  }

  async setActiveCompetition(name: string): Promise<void> {
    assertCompetitionName(name);
    const config = await this.config.load();
    config.default_competition = name;
    await this.config.save(config);
  }
}
