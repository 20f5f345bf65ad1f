export class HistoryFormatError extends Error {
  constructor(
    message: string,
    public readonly context: {
      competition: string;
      line: number;
    }
  ) {
    super(`${context.competition}:${context.line}: ${message}`);
    this.name = 'HistoryFormatError';
  }
}

export class ConfigFormatError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(`${path}: ${message}`);
    this.name = 'ConfigFormatError';
  }
}

export class InvalidPlayerNameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPlayerNameError';
  }
}

export class InvalidCompetitionNameError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCompetitionNameError';
  }
}

export class InvalidMatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidMatchError';
  }
}
