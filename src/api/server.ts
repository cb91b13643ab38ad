/**
 * Vocab Drill API Server
 *
 * Serves the Hono application on Node through @hono/node-server.
 *
 * Usage:
 *   npm run server
 *
 * Environment Variables:
 *   PORT, HOST - Listen address (default 0.0.0.0:3000)
 *   VOCAB_TEST_MODE - Accelerated time (x1000) with a separate database
 *   DATABASE_PATH - SQLite file
 *
 * @example
 * ```bash
 * PORT=8080 npm run server
 * VOCAB_TEST_MODE=1 npm run server
 * ```
 */

import { serve } from '@hono/node-server';
import { loadConfig } from '../config';
import { DictionaryClient } from '../core/dictionary';
import { ReviewService } from '../core/review';
import { SystemClock } from '../core/scheduler';
import { closeDatabase, createDatabase } from '../storage/db';
import { VocabCardRepository } from '../storage/repositories';
import { createApp } from './app';

function main(): void {
  const config = loadConfig(process.env, process.argv.slice(2));

  const db = createDatabase(config.database.path);
  const clock = new SystemClock(config.scheduler.accelerationFactor);
  const service = new ReviewService(new VocabCardRepository(db), clock, {
    efOrdering: config.scheduler.efOrdering,
  });

  const dictionary = config.dictionary.enabled
    ? new DictionaryClient({
        apiUrl: config.dictionary.apiUrl,
        translationUrl: config.dictionary.translationUrl,
        languagePair: config.dictionary.languagePair,
        timeoutMs: config.dictionary.timeoutMs,
      })
    : null;

  const app = createApp({ service, dictionary });

  const server = serve(
    { fetch: app.fetch, port: config.server.port, hostname: config.server.host },
    (info) => {
      console.log(`[Server] Listening on http://${info.address}:${info.port}`);
      console.log(`[Server] Database: ${config.database.path}`);
      if (config.app.testMode) {
        console.log(`[Server] TEST MODE: time x${config.scheduler.accelerationFactor}`);
      }
    }
  );

  const shutdown = (): void => {
    console.log('[Server] Shutting down...');
    server.close(() => {
      closeDatabase(db);
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main();
