#!/usr/bin/env node
import dotenv from 'dotenv';
import { hideBin } from 'yargs/helpers';

import { runCli } from './cli.js';
import { loadSettings } from './config/env.js';
import { FileConfigStore } from './config/store.js';
import { CompetitionService } from './services/competition.js';
import { FileHistoryStore } from './store/index.js';

dotenv.config();

const main = async () => {
  const settings = loadSettings();
  const service = new CompetitionService({
    history: new FileHistoryStore(settings.home),
    config: new FileConfigStore(settings.home),
    params: settings.params,
    fallbackCompetition: settings.fallbackCompetition,
  });
  await runCli(hideBin(process.argv), { service, write: (line) => console.log(line) });
};

main().catch((err) => {
  console.error('command_failed', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
