/**
 * Application Errors
 *
 * Controlled errors raised by the application services. Each carries a
 * machine-readable code and the HTTP status the API answers with, so the
 * CLI and the HTTP layer report them without inspecting messages.
 *
 * @example
 * ```typescript
 * throw new AppError('NOT_FOUND', 'Card not found', 404);
 * ```
 */

import type { ContentfulStatusCode } from 'hono/utils/http-status';

/**
 * Standard error codes used throughout the application.
 */
export const ErrorCodes = {
  // Client errors (4xx)
  BAD_REQUEST: 'BAD_REQUEST',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  CONFLICT: 'CONFLICT',

  // Server errors (5xx)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class for controlled application errors.
 */
export class AppError extends Error {
  /** Machine-readable error code */
  public readonly code: ErrorCode | string;
  /** HTTP status code to return */
  public readonly statusCode: ContentfulStatusCode;
  /** Additional error context (optional) */
  public readonly details?: unknown;

  constructor(
    code: ErrorCode | string,
    message: string,
    statusCode: ContentfulStatusCode = 500,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown (V8 engines)
    Error.captureStackTrace?.(this, new.target);
  }
}

/**
 * No card with the given id or word exists.
 */
export class CardNotFoundError extends AppError {
  constructor(key: string) {
    super(ErrorCodes.NOT_FOUND, `Card '${key}' not found`, 404, { key });
    this.name = 'CardNotFoundError';
  }
}

/**
 * A card for the word already exists.
 */
export class DuplicateWordError extends AppError {
  public readonly word: string;

  constructor(word: string) {
    super(ErrorCodes.CONFLICT, `Word '${word}' is already in the list`, 409, { word });
    this.name = 'DuplicateWordError';
    this.word = word;
  }
}

/**
 * Input failed validation.
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(ErrorCodes.VALIDATION_ERROR, message, 400, details);
    this.name = 'ValidationError';
  }
}
