/**
 * Dictionary Lookup Route
 *
 * GET /:word - every distinct meaning of a word. An unknown word (or a
 * failed lookup) yields an empty list, not an error.
 */

import { Hono } from 'hono';
import type { DictionaryClient } from '@/core/dictionary';
import { AppError } from '@/core/errors';
import { success } from '../utils/response';

/**
 * @param dictionary - null when lookups are disabled; the route then
 *   answers 503 LOOKUP_DISABLED
 */
export function lookupRoutes(dictionary: DictionaryClient | null): Hono {
  const router = new Hono();

  router.get('/:word', async (c) => {
    if (!dictionary) {
      throw new AppError('LOOKUP_DISABLED', 'Dictionary lookup is disabled', 503);
    }

    const word = c.req.param('word');
    const meanings = await dictionary.lookupAllMeanings(word);
    return success(c, { word, meanings });
  });

  return router;
}
