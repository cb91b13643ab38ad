/**
 * Global Error Handler for the Vocab Drill API
 *
 * Turns every error thrown by a route into the standard error envelope:
 *
 * ```json
 * {
 *   "success": false,
 *   "error": { "code": "ERROR_CODE", "message": "...", "details": { ... } }
 * }
 * ```
 *
 * Status mapping:
 * - AppError subclasses carry their own status (404, 409, 400)
 * - InvalidRatingError -> 400 INVALID_RATING
 * - InconsistentStateError -> 500 INCONSISTENT_STATE
 * - anything else -> 500 INTERNAL_ERROR
 *
 * Registered with `app.onError`, which Hono calls for errors thrown by any
 * handler or middleware.
 *
 * @example
 * ```typescript
 * const app = new Hono();
 * app.onError(errorHandler);
 * ```
 */

import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { AppError, ErrorCodes } from '@/core/errors';
import { InconsistentStateError, SchedulerError, SchedulerErrorCodes } from '@/core/scheduler';
import type { ApiErrorResponse } from '../types';

/**
 * Formats an error into the standard API error response structure.
 */
function formatErrorResponse(error: unknown): {
  response: ApiErrorResponse;
  statusCode: ContentfulStatusCode;
} {
  // Controlled application errors
  if (error instanceof AppError) {
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error.details !== undefined && { details: error.details }),
        },
      },
      statusCode: error.statusCode,
    };
  }

  if (error instanceof SchedulerError) {
    const statusCode = error.code === SchedulerErrorCodes.INVALID_RATING ? 400 : 500;
    return {
      response: {
        success: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error instanceof InconsistentStateError && {
            details: { field: error.field, value: error.value },
          }),
        },
      },
      statusCode,
    };
  }

  // Unexpected errors; include details outside production for debugging
  const isDev = process.env.NODE_ENV !== 'production';

  if (error instanceof Error) {
    return {
      response: {
        success: false,
        error: {
          code: ErrorCodes.INTERNAL_ERROR,
          message: isDev ? error.message : 'An unexpected error occurred. Please try again.',
          ...(isDev && { details: { stack: error.stack } }),
        },
      },
      statusCode: 500,
    };
  }

  return {
    response: {
      success: false,
      error: {
        code: ErrorCodes.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        ...(isDev && { details: { rawError: String(error) } }),
      },
    },
    statusCode: 500,
  };
}

/**
 * Hono error handler producing the standard error envelope.
 */
export const errorHandler: ErrorHandler = (err, c) => {
  const { response, statusCode } = formatErrorResponse(err);

  // Client errors are reported to the caller only
  if (statusCode >= 500) {
    console.error('[Error Handler]', err);
  }

  return c.json(response, statusCode);
};
