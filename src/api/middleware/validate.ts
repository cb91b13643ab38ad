/**
 * Zod Validation Middleware
 *
 * Validates JSON request bodies against a zod schema before the route
 * handler runs. Invalid bodies are answered with 400 and field-level
 * details; the handler reads the parsed body with getValidatedBody.
 *
 * @example
 * ```typescript
 * router.post('/', validate(createCardSchema), async (c) => {
 *   const body = getValidatedBody(c, createCardSchema);
 *   return success(c, await service.addWord(body), 201);
 * });
 * ```
 */

import type { Context, Next, MiddlewareHandler } from 'hono';
import { z } from 'zod';
import type { ValidationErrorDetail } from '../types';
import { error } from '../utils/response';

declare module 'hono' {
  interface ContextVariableMap {
    /** The request body after passing through the validate middleware */
    validatedBody: unknown;
  }
}

/**
 * Creates a validation middleware for the given zod schema.
 *
 * Error response for an invalid body:
 * ```json
 * {
 *   "success": false,
 *   "error": {
 *     "code": "VALIDATION_ERROR",
 *     "message": "Invalid request body",
 *     "details": [{ "path": "word", "message": "Word is required" }]
 *   }
 * }
 * ```
 */
export function validate<T extends z.ZodType>(schema: T): MiddlewareHandler {
  return async (c: Context, next: Next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return error(c, 'INVALID_JSON', 'Request body must be valid JSON', 400);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      const details: ValidationErrorDetail[] = result.error.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      }));
      return error(c, 'VALIDATION_ERROR', 'Invalid request body', 400, details);
    }

    c.set('validatedBody', result.data);
    await next();
  };
}

/**
 * Typed access to the body stored by validate(). The stored value already
 * passed the schema, so parsing it again only recovers its static type.
 */
export function getValidatedBody<T extends z.ZodType>(c: Context, schema: T): z.infer<T> {
  return schema.parse(c.get('validatedBody'));
}
