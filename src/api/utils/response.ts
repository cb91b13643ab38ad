/**
 * API Response Utilities
 *
 * Helpers producing the standard envelopes defined in types.ts.
 *
 * @example
 * ```typescript
 * import { success } from '@/api/utils/response';
 *
 * router.get('/', async (c) => success(c, await service.listAll()));
 * ```
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse, ApiErrorResponse } from '../types';

/**
 * `{ success: true, data }` with the given status.
 *
 * @example
 * ```typescript
 * return success(c, card, 201);
 * ```
 */
export function success<T>(
  c: Context,
  data: T,
  statusCode: ContentfulStatusCode = 200
): Response {
  const response: ApiResponse<T> = {
    success: true,
    data,
  };

  return c.json(response, statusCode);
}

/**
 * `{ success: false, error: { code, message, details? } }`. Handlers throw
 * instead; this is for middleware and the not-found handler.
 *
 * @example
 * ```typescript
 * return error(c, 'INVALID_JSON', 'Request body must be valid JSON', 400);
 * ```
 */
export function error(
  c: Context,
  code: string,
  message: string,
  statusCode: ContentfulStatusCode = 400,
  details?: unknown
): Response {
  const response: ApiErrorResponse = {
    success: false,
    error: {
      code,
      message,
      ...(details !== undefined && { details }),
    },
  };

  return c.json(response, statusCode);
}
