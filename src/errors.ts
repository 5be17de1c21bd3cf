/**
 * Error types that the CLI maps to distinct exit statuses.
 */

/** Invalid or missing command-line input. Raised before any database is opened. */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

/**
 * The operator cancelled a run before the delete was issued.
 *
 * Never wrap or convert this error: the CLI relies on seeing it unchanged to
 * report an interrupted run.
 */
export class TrimInterruptedError extends Error {
  constructor(message = 'Trim interrupted before deletion') {
    super(message);
    this.name = 'TrimInterruptedError';
  }
}

export function isTrimInterrupted(error: unknown): error is TrimInterruptedError {
  return error instanceof TrimInterruptedError;
}
