/** Raised when a game configuration is rejected before any tick runs. */
export class GameConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid game config: ${issues.join("; ")}`);
    this.name = "GameConfigError";
    this.issues = issues;
  }
}

export class ReplayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReplayError";
  }
}

export class DataRepositoryError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DataRepositoryError";
  }
}
