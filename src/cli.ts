import yargs from 'yargs';
import { z } from 'zod';

import { describeRecord, formatRanking, formatRatingChanges } from './format.js';
import type { CompetitionService } from './services/competition.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const ResultSchema = z.union([z.literal(0), z.literal(1)]);

export interface CliDeps {
  service: CompetitionService;
  write: (line: string) => void;
}

export const buildCli = (args: string[], { service, write }: CliDeps) => {
  const resolveCompetition = async (override: string | undefined) =>
    override ?? (await service.getActiveCompetition());

  return yargs(args)
    .scriptName('elo')
    .option('competition', {
      alias: 'c',
      type: 'string',
      describe: 'Competition to use instead of the active one',
    })
    .command(
      'match <name1> <name2> <result>',
      'Record a match between two players',
      (cmd) =>
        cmd
          .positional('name1', { type: 'string', demandOption: true, describe: 'First player' })
          .positional('name2', { type: 'string', demandOption: true, describe: 'Second player' })
          .positional('result', {
            type: 'number',
            choices: [0, 1],
            demandOption: true,
            describe: '1 if the first player won, 0 if the second player won',
          }),
      async (argv) => {
        const parsed = ResultSchema.safeParse(argv.result);
        if (!parsed.success) throw new UsageError(`result must be 0 or 1, got ${argv.result}`);
        const competition = await resolveCompetition(argv.competition);
        const outcome = await service.recordMatch(competition, argv.name1, argv.name2, parsed.data);
        for (const name of outcome.registered) {
          write(`Registered ${name} in ${competition}.`);
        }
        formatRatingChanges(outcome.players).forEach((line) => write(line));
      }
    )
    .command(
      'undo',
      'Remove the last record of the competition',
      (cmd) => cmd,
      async (argv) => {
        const competition = await resolveCompetition(argv.competition);
        const removed = await service.undoLastMatch(competition);
        write(removed ? `Removed: ${describeRecord(removed)}` : `Nothing to undo in ${competition}.`);
      }
    )
    .command(
      'ranking',
      'Show players ordered by rating',
      (cmd) => cmd,
      async (argv) => {
        const competition = await resolveCompetition(argv.competition);
        const ranking = await service.listRanking(competition);
        if (!ranking.length) {
          write(`No players in ${competition}.`);
          return;
        }
        formatRanking(ranking).forEach((line) => write(line));
      }
    )
    .command(
      'start <name>',
      'Make a competition the active one',
      (cmd) => cmd.positional('name', { type: 'string', demandOption: true, describe: 'Competition name' }),
      async (argv) => {
        await service.setActiveCompetition(argv.name);
        write(`Active competition: ${argv.name}`);
      }
    )
    .command(
      'register <name>',
      'Add a player without recording a match',
      (cmd) => cmd.positional('name', { type: 'string', demandOption: true, describe: 'Player name' }),
      async (argv) => {
        const competition = await resolveCompetition(argv.competition);
        const added = await service.registerPlayer(competition, argv.name);
        write(added ? `Registered ${argv.name} in ${competition}.` : `${argv.name} is already registered in ${competition}.`);
      }
    )
    .command(
      'history',
      'List every record of the competition in order',
      (cmd) => cmd,
      async (argv) => {
        const competition = await resolveCompetition(argv.competition);
        const history = await service.getHistory(competition);
        if (!history.length) {
          write(`No records in ${competition}.`);
          return;
        }
        history.forEach((record, index) => write(`${index + 1}. ${describeRecord(record)}`));
      }
    )
    .command(
      'competitions',
      'List competitions that have a match log',
      (cmd) => cmd,
      async () => {
        const [names, active] = await Promise.all([service.listCompetitions(), service.getActiveCompetition()]);
        if (!names.length) {
          write(`No competitions yet. Active competition: ${active}`);
          return;
        }
        names.forEach((name) => write(`${name === active ? '*' : ' '} ${name}`));
      }
    )
    .demandCommand(1, 'Choose a command')
    .strict()
    .version(false)
    .help()
    .exitProcess(false)
    .fail((message, err) => {
      throw err ?? new UsageError(message);
    });
};

export const runCli = async (args: string[], deps: CliDeps) => {
  await buildCli(args, deps).parseAsync();
};
