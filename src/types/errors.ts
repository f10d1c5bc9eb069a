/**
 * The driven browser process is unreachable, crashed, or the session was
 * never started. Fatal for the run; never retried automatically.
 */
export class SessionUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SessionUnavailableError';
  }
}

/**
 * A record could not be built because a required field resolved to absent.
 * Batch loops catch it and count the item as skipped.
 */
export class ExtractionError extends Error {
  readonly field: string;

  constructor(field: string, message?: string) {
    super(message ?? `Required field "${field}" could not be extracted`);
    this.name = 'ExtractionError';
    this.field = field;
  }
}
