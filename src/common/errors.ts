/**
 * Raised when a whole input source cannot be used: the file is missing,
 * unreadable, or its top-level structure is wrong. Aborts the run.
 */
export class InputSourceError extends Error {
  readonly name = "InputSourceError";

  constructor(
    public readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${message} (source: ${source})`, options);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InputSourceError);
    }
  }

  static unreadable(source: string, cause: unknown): InputSourceError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new InputSourceError(source, `Unable to read input: ${reason}`, { cause });
  }
}

/**
 * Raised when authoritative data violates its contract, such as an
 * agreement list that is not a list.
 */
export class DataIntegrityError extends Error {
  readonly name = "DataIntegrityError";

  constructor(
    message: string,
    public readonly source?: string,
  ) {
    super(source ? `${message} (source: ${source})` : message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, DataIntegrityError);
    }
  }
}
