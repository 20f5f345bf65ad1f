import { InvalidCompetitionNameError, InvalidPlayerNameError } from './errors.js';

const LINE_BREAK = /[\r\n]/;
const PATH_SEPARATOR = /[\\/]/;

export const assertPlayerName = (name: string) => {
  if (!name.length) throw new InvalidPlayerNameError('player name must not be empty');
  if (LINE_BREAK.test(name)) {
    throw new InvalidPlayerNameError(`player name ${JSON.stringify(name)} contains a line break`);
  }
};

export const assertCompetitionName = (name: string) => {
  if (!name.trim().length) throw new InvalidCompetitionNameError('competition name must not be empty');
  if (name === '.' || name === '..' || PATH_SEPARATOR.test(name) || LINE_BREAK.test(name)) {
    throw new InvalidCompetitionNameError(`invalid competition name ${JSON.stringify(name)}`);
  }
};
