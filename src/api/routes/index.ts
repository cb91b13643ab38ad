/**
 * API Routes
 *
 * Central router for /api, plus re-exports of the route modules.
 *
 * @example
 * ```typescript
 * app.route('/api', createApiRouter(dependencies));
 * ```
 */

import { Hono } from 'hono';
import type { DictionaryClient } from '@/core/dictionary';
import type { ReviewService } from '@/core/review';
import { success } from '../utils/response';
import { cardsRoutes } from './cards';
import { APP_VERSION } from './health';
import { lookupRoutes } from './lookup';
import { statsRoutes } from './stats';

export { healthRoutes, APP_VERSION, type HealthCheckData } from './health';
export { cardsRoutes } from './cards';
export { statsRoutes } from './stats';
export { lookupRoutes } from './lookup';

/**
 * API information returned by GET /api.
 */
export interface ApiInfo {
  name: string;
  version: string;
  endpoints: {
    path: string;
    description: string;
  }[];
}

export interface ApiRouterDependencies {
  service: ReviewService;
  dictionary: DictionaryClient | null;
}

export function createApiRouter({ service, dictionary }: ApiRouterDependencies): Hono {
  const router = new Hono();

  router.get('/', (c) => {
    const apiInfo: ApiInfo = {
      name: 'Vocab Drill API',
      version: APP_VERSION,
      endpoints: [
        { path: '/api/cards', description: 'Vocabulary cards' },
        { path: '/api/cards/due', description: 'Cards due for review' },
        { path: '/api/cards/:id/review', description: 'Rate a card (1 forgot, 2 hard, 3 easy)' },
        { path: '/api/stats', description: 'Statistics' },
        { path: '/api/lookup/:word', description: 'Dictionary meanings of a word' },
        { path: '/health', description: 'Health check endpoint' },
      ],
    };

    return success(c, apiInfo);
  });

  router.route('/cards', cardsRoutes(service));
  router.route('/stats', statsRoutes(service));
  router.route('/lookup', lookupRoutes(dictionary));

  return router;
}
