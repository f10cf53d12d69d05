/**
 * Error classes shared by the scanner and the CLI
 */

export class MetanoteError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Conflicting or invalid command line usage */
export class UsageError extends MetanoteError {}

/**
 * A broken internal invariant. Never downgraded to a diagnostic.
 */
export class InternalError extends MetanoteError {}
