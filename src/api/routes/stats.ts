/**
 * Statistics Route
 *
 * GET / - totals per phase, cards due now and the average easiness factor
 * of graduated cards.
 */

import { Hono } from 'hono';
import type { ReviewService } from '@/core/review';
import { success } from '../utils/response';

export function statsRoutes(service: ReviewService): Hono {
  const router = new Hono();

  router.get('/', async (c) => {
    return success(c, await service.getStats());
  });

  return router;
}
