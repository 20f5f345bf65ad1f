import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import { FALLBACK_COMPETITION } from './env.js';
import { ConfigFormatError } from '../store/errors.js';

const ConfigSchema = z
  .object({
    default_competition: z.string().optional(),
  })
  .passthrough();

export type Config = z.infer<typeof ConfigSchema>;

export interface ConfigStore {
  load(): Promise<Config>;
  save(config: Config): Promise<void>;
}

export const getDefaultCompetition = (config: Config, fallback = FALLBACK_COMPETITION) =>
  config.default_competition ?? fallback;

const parseConfig = (raw: string, source: string): Config => {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (err) {
    throw new ConfigFormatError(err instanceof Error ? err.message : 'invalid JSON', source);
  }
  const parsed = ConfigSchema.safeParse(value);
  if (!parsed.success) {
    throw new ConfigFormatError('expected an object with a string default_competition', source);
  }
  return parsed.data;
};

export class FileConfigStore implements ConfigStore {
  readonly path: string;

  constructor(root: string) {
    this.path = path.join(root, 'config');
  }

  async load(): Promise<Config> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return {};
      throw err;
    }
    return parseConfig(raw, this.path);
  }

  async save(config: Config): Promise<void> {
    await mkdir(path.dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(config), 'utf8');
  }
}

export class MemoryConfigStore implements ConfigStore {
  private config: Config;

  constructor(initial: Config = {}) {
    this.config = { ...initial };
  }

  async load(): Promise<Config> {
    return { ...this.config };
  }

  async save(config: Config): Promise<void> {
    this.config = { ...config };
  }
}
