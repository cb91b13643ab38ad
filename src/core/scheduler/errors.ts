/**
 * Review Scheduler Errors
 *
 * The scheduler performs no I/O, so it only fails on bad input: a rating
 * token it does not recognize, or a card whose stored schedule breaks the
 * phase invariants. Both carry a machine-readable code so adapters (CLI,
 * HTTP) can react without string matching.
 */

export const SchedulerErrorCodes = {
  INVALID_RATING: 'INVALID_RATING',
  INCONSISTENT_STATE: 'INCONSISTENT_STATE',
} as const;

export type SchedulerErrorCode =
  (typeof SchedulerErrorCodes)[keyof typeof SchedulerErrorCodes];

/**
 * Base class for every error raised by the scheduler core.
 */
export class SchedulerError extends Error {
  /** Machine-readable error code */
  public readonly code: SchedulerErrorCode;

  constructor(code: SchedulerErrorCode, message: string) {
    super(message);
    this.name = 'SchedulerError';
    this.code = code;

    Error.captureStackTrace?.(this, new.target);
  }
}

/**
 * Raised when a rating token is not one of Forgot, Hard or Easy.
 *
 * Recoverable: the caller re-prompts and the card stays due.
 */
export class InvalidRatingError extends SchedulerError {
  /** The raw token that was rejected */
  public readonly token: string;

  constructor(token: string) {
    super(
      SchedulerErrorCodes.INVALID_RATING,
      `Invalid rating '${token}'. Expected 1 (forgot), 2 (hard) or 3 (easy).`
    );
    this.name = 'InvalidRatingError';
    this.token = token;
  }
}

/**
 * Raised when a schedule violates its phase invariants, e.g. a learning card
 * at step 4 or a graduated card with an easiness factor below 1.3.
 *
 * This signals corrupted persisted data. The review is refused and the
 * record is left as it is.
 */
export class InconsistentStateError extends SchedulerError {
  /** Name of the offending field */
  public readonly field: string;

  /** The value found in that field */
  public readonly value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    super(
      SchedulerErrorCodes.INCONSISTENT_STATE,
      `Inconsistent schedule: ${field}=${String(value)} ${reason}`
    );
    this.name = 'InconsistentStateError';
    this.field = field;
    this.value = value;
  }
}
