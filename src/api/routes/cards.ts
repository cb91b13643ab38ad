/**
 * Vocab Cards API Routes
 *
 * Endpoints:
 * - GET    /             - List all cards, alphabetically
 * - GET    /due          - Cards due now, earliest first
 * - GET    /:id          - One card
 * - POST   /             - Add a word
 * - DELETE /             - Delete every card
 * - DELETE /:id          - Delete one card
 * - POST   /:id/review   - Apply a rating ({ "rating": 1 | 2 | 3 | "forgot" | "hard" | "easy" })
 *
 * All endpoints return the standard envelopes; service errors are mapped to
 * status codes by the error handler.
 */

import { Hono } from 'hono';
import type { ReviewService } from '@/core/review';
import { formatTimeUntil, parseRating } from '@/core/scheduler';
import { getValidatedBody, validate } from '../middleware/validate';
import { createCardSchema, reviewCardSchema } from '../types';
import { success } from '../utils/response';

/**
 * Creates the cards router over a review service.
 *
 * @example
 * ```typescript
 * app.route('/api/cards', cardsRoutes(service));
 * ```
 */
export function cardsRoutes(service: ReviewService): Hono {
  const router = new Hono();

  router.get('/', async (c) => {
    return success(c, await service.listAll());
  });

  // Registered before /:id so 'due' is not taken for an id
  router.get('/due', async (c) => {
    return success(c, await service.listDue());
  });

  router.get('/:id', async (c) => {
    return success(c, await service.getCard(c.req.param('id')));
  });

  /**
   * POST /
   *
   * Response: 201 Created with the new card, due one (accelerated) minute
   * from now. 409 CONFLICT if the word exists.
   */
  router.post('/', validate(createCardSchema), async (c) => {
    const body = getValidatedBody(c, createCardSchema);
    const card = await service.addWord(body);
    return success(c, card, 201);
  });

  router.delete('/', async (c) => {
    const deleted = await service.clearAll();
    return success(c, { deleted });
  });

  router.delete('/:id', async (c) => {
    const card = await service.deleteCard(c.req.param('id'));
    return success(c, { deleted: card.id });
  });

  /**
   * POST /:id/review
   *
   * Response: 200 with { card, event, feedback, nextReviewIn }.
   * 400 INVALID_RATING for an unknown rating; the card is left as it was.
   */
  router.post('/:id/review', validate(reviewCardSchema), async (c) => {
    const { rating } = getValidatedBody(c, reviewCardSchema);
    const outcome = await service.submitRating(c.req.param('id'), parseRating(String(rating)));

    return success(c, {
      ...outcome,
      nextReviewIn: formatTimeUntil(outcome.card.schedule.nextDue, service.getClock()),
    });
  });

  return router;
}
