/**
 * API Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { createApp } from '@/api';
 *
 * const app = createApp({ service, dictionary: null });
 * const res = await app.request('/api/cards/due');
 * ```
 */

export { createApp, type AppDependencies } from './app';

export { errorHandler, loggerMiddleware, validate, getValidatedBody } from './middleware';

export { createApiRouter, healthRoutes, cardsRoutes, statsRoutes, lookupRoutes } from './routes';

export { success, error } from './utils/response';

export type {
  ApiResponse,
  ApiErrorResponse,
  ApiError,
  ApiResult,
  ValidationErrorDetail,
} from './types';
