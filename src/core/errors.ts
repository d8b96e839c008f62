/**
 * A topology reference that does not exist in the draw: unknown category or
 * round, out-of-range match index, or a draw whose size is not a power of two.
 */
export class BracketTopologyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BracketTopologyError';
  }
}

export class MatchKeyError extends Error {
  constructor(readonly key: string, reason: string) {
    super(`Invalid match key "${key}": ${reason}`);
    this.name = 'MatchKeyError';
  }
}

export class ScoringConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScoringConfigError';
  }
}

/** An input file that is missing or does not have the expected shape. */
export class DataFileError extends Error {
  constructor(readonly filePath: string, reason: string) {
    super(`${filePath}: ${reason}`);
    this.name = 'DataFileError';
  }
}
