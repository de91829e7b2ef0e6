/**
 * Base error class for all application errors.
 * Provides an optional error code for programmatic handling.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/**
 * A file name does not follow the `YYYY-MM-DD-HH:MM:SS.<ext>` contract, or one
 * of its date/time components is out of range. Fatal for that one file only.
 */
export class ParseError extends AppError {
  constructor(
    public readonly filename: string,
    detail: string
  ) {
    super(`Cannot parse timestamp from "${filename}": ${detail}`, 'PARSE_ERROR');
    this.name = 'ParseError';
  }
}

/**
 * The audio resource could not be opened, decoded or probed.
 * Fatal for the `load()` call; a previously loaded project stays in place.
 */
export class LoadError extends AppError {
  constructor(
    detail: string,
    public readonly originalError?: unknown
  ) {
    super(detail, 'LOAD_ERROR');
    this.name = 'LoadError';
  }
}

/**
 * The audio transport rejected a command (play, seek, ...) or failed while
 * playing. Surfaced through the scheduler's `error` event.
 */
export class TransportError extends AppError {
  constructor(
    detail: string,
    public readonly originalError?: unknown
  ) {
    super(detail, 'TRANSPORT_ERROR');
    this.name = 'TransportError';
  }
}

/**
 * Invalid arguments or serialized data passed to a public API
 * (e.g. negative duration, non-positive frame rate, malformed JSON shape).
 */
export class ValidationError extends AppError {
  constructor(detail: string) {
    super(detail, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

/** Extract a readable message from anything thrown. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
