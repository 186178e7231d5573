export class LearnloopError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LearnloopError";
  }
}

/** Blank text handed to the analyzer. Callers must filter upstream. */
export class InvalidInputError extends LearnloopError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

/**
 * Raised when there is nothing to summarize. A "no pattern yet" signal,
 * not something to show an end user.
 */
export class InsufficientDataError extends LearnloopError {
  constructor(
    message: string,
    public readonly available: number,
    public readonly required: number,
  ) {
    super(message);
    this.name = "InsufficientDataError";
  }
}

export class ConfigurationError extends LearnloopError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}
