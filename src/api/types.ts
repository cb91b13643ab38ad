/**
 * API Response Types and Request Schemas
 *
 * Every endpoint answers with one of two envelopes:
 *
 * ```json
 * { "success": true, "data": { ... } }
 * { "success": false, "error": { "code": "NOT_FOUND", "message": "...", "details": { ... } } }
 * ```
 *
 * Request bodies are validated with the zod schemas below.
 */

import { z } from 'zod';

// ============================================================================
// Response Envelopes
// ============================================================================

/**
 * Standard success response wrapper.
 *
 * @typeParam T - The type of data being returned
 */
export interface ApiResponse<T> {
  success: true;
  data: T;
}

/**
 * Detailed error information.
 */
export interface ApiError {
  /** Machine-readable error code, e.g. 'VALIDATION_ERROR', 'INVALID_RATING' */
  code: string;
  /** Human-readable error message */
  message: string;
  /** Field-level validation failures or other context */
  details?: unknown;
}

/**
 * Standard error response wrapper.
 */
export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

/**
 * One failed field of a request body.
 */
export interface ValidationErrorDetail {
  /** Dot-notation path to the invalid field */
  path: string;
  message: string;
}

// ============================================================================
// Request Schemas
// ============================================================================

/**
 * Body of POST /api/cards.
 *
 * @example
 * ```json
 * { "word": "diligent", "meaning": "Showing care and effort.", "partOfSpeech": "adjective" }
 * ```
 */
export const createCardSchema = z.object({
  word: z.string().trim().min(1, 'Word is required').max(100, 'Word must be 100 characters or less'),
  meaning: z.string().trim().min(1, 'Meaning is required'),
  partOfSpeech: z.string().trim().optional(),
  translation: z.string().trim().optional(),
});

export type CreateCardBody = z.infer<typeof createCardSchema>;

/**
 * Body of POST /api/cards/:id/review.
 *
 * The rating is checked by the rating parser, not here, so that an unknown
 * token is reported as INVALID_RATING. Accepts 1/2/3 (number or string)
 * and the names forgot/hard/easy.
 */
export const reviewCardSchema = z.object({
  rating: z.union([z.string(), z.number()]),
});

export type ReviewCardBody = z.infer<typeof reviewCardSchema>;
