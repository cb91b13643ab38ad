/**
 * API Middleware - Barrel Export
 *
 * @example
 * ```typescript
 * import { errorHandler, loggerMiddleware, validate } from '@/api/middleware';
 *
 * const app = new Hono();
 * app.onError(errorHandler);
 * app.use('*', loggerMiddleware());
 * ```
 */

export { errorHandler } from './error-handler';

export {
  loggerMiddleware,
  formatRequestLine,
  formatResponseTime,
  DEFAULT_LOGGER_CONFIG,
  type LoggerConfig,
  type RequestLogEntry,
} from './logger';

export { validate, getValidatedBody } from './validate';
