import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { MatchRecord } from '../engine/types.js';
import { decodeRecord, encodeHistory } from './codec.js';
import { HistoryFormatError } from './errors.js';
import { assertCompetitionName } from './helpers.js';
import type { MatchHistoryStore } from './types.js';

const LOG_EXTENSION = '.txt';

const isMissing = (err: unknown) =>
  err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');

/**
 * One text file per competition under `<root>/match_history`, one record per
 * line. Saves rewrite the whole file.
 */
export class FileHistoryStore implements MatchHistoryStore {
  private readonly directory: string;

  constructor(root: string) {
    this.directory = path.join(root, 'match_history');
  }

  pathFor(competition: string) {
    assertCompetitionName(competition);
    return path.join(this.directory, `${competition}${LOG_EXTENSION}`);
  }

  async load(competition: string): Promise<MatchRecord[]> {
    let contents: string;
    try {
      contents = await readFile(this.pathFor(competition), 'utf8');
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }

    const history: MatchRecord[] = [];
    const lines = contents.split('\n');
    for (const [index, raw] of lines.entries()) {
      const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
      if (!line.trim().length) continue;
      const decoded = decodeRecord(line);
      if (!decoded.ok) {
        throw new HistoryFormatError(decoded.message, { competition, line: index + 1 });
      }
      history.push(decoded.record);
    }
    return history;
  }

  async save(competition: string, history: readonly MatchRecord[]): Promise<void> {
    const target = this.pathFor(competition);
    const contents = encodeHistory(history);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, contents, 'utf8');
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    return entries
      .filter((entry) => entry.endsWith(LOG_EXTENSION))
      .map((entry) => entry.slice(0, -LOG_EXTENSION.length))
      .sort((a, b) => a.localeCompare(b));
  }
}
