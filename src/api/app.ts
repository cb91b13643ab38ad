/**
 * Hono Application Factory
 *
 * Builds the API application from its dependencies. The server entry point
 * passes the real service; tests pass one over an in-memory database and
 * call `app.request()` directly.
 *
 * Middleware order:
 * 1. Logger - logs every request with timing
 * 2. Routes
 * Errors from any of them reach the error handler registered with onError.
 */

import { Hono } from 'hono';
import type { DictionaryClient } from '@/core/dictionary';
import type { ReviewService } from '@/core/review';
import { errorHandler, loggerMiddleware, type LoggerConfig } from './middleware';
import { createApiRouter, healthRoutes } from './routes';
import { error } from './utils/response';

export interface AppDependencies {
  service: ReviewService;
  dictionary: DictionaryClient | null;
  /** Logger overrides; `false` disables request logging */
  logger?: Partial<LoggerConfig> | false;
}

export function createApp({ service, dictionary, logger = {} }: AppDependencies): Hono {
  const app = new Hono();

  app.onError(errorHandler);

  app.notFound((c) => error(c, 'NOT_FOUND', `Route ${c.req.method} ${c.req.path} not found`, 404));

  if (logger !== false) {
    app.use('*', loggerMiddleware(logger));
  }

  app.route('/health', healthRoutes(service.getClock()));
  app.route('/api', createApiRouter({ service, dictionary }));

  return app;
}
