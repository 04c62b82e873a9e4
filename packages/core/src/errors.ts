/** Malformed configuration input, such as an icon theme name with a slash in it. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** A single check attempt failed. Always ends up as an `error` Status. */
export class CheckerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CheckerError';
  }
}

/** The coordination pipeline could not be set up, or its loop died. */
export class FatalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FatalError';
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
