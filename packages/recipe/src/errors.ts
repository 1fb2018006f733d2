export type RecipeErrorCode =
  | 'UNKNOWN_OPTION'
  | 'INVALID_OPTION_VALUE'
  | 'MISSING_SOURCE'
  | 'INVALID_CONFIG';

export class RecipeError extends Error {
  readonly code: RecipeErrorCode;

  constructor(code: RecipeErrorCode, message: string) {
    super(message);
    this.name = 'RecipeError';
    this.code = code;
  }
}

export class UnknownOptionError extends RecipeError {
  readonly keys: string[];

  constructor(keys: string[], known: readonly string[]) {
    const listed = keys.map((key) => `'${key}'`).join(', ');
    super('UNKNOWN_OPTION', `Unknown option ${listed}. Known options: ${known.join(', ')}`);
    this.name = 'UnknownOptionError';
    this.keys = keys;
  }
}

export class InvalidOptionValueError extends RecipeError {
  readonly assignment: string;

  constructor(assignment: string, reason: string) {
    super('INVALID_OPTION_VALUE', `Invalid option assignment '${assignment}': ${reason}`);
    this.name = 'InvalidOptionValueError';
    this.assignment = assignment;
  }
}

export class MissingSourceError extends RecipeError {
  readonly sourcePath: string;

  constructor(sourcePath: string) {
    super('MISSING_SOURCE', `Required source file ${sourcePath} was not found`);
    this.name = 'MissingSourceError';
    this.sourcePath = sourcePath;
  }
}

export class RecipeConfigError extends RecipeError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
    this.name = 'RecipeConfigError';
  }
}
