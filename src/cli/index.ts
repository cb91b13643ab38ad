#!/usr/bin/env tsx
/**
 * CLI Entry Point for Vocab Drill
 *
 * Loads configuration, opens the database, wires the review service and
 * the dictionary client, and runs the commander program.
 *
 * Usage:
 * ```bash
 * # Add a word (definition looked up online)
 * npm run cli -- add diligent
 *
 * # Review what is due
 * npm run cli -- review
 *
 * # Accelerated time: 1 min = 0.06s, 10 min = 0.6s, 1 day = 86.4s
 * npm run cli -- --test add diligent
 * npm run cli -- --test wait 1
 * npm run cli -- --test review
 * ```
 */

import { setTimeout as sleep } from 'timers/promises';
import { ConfigValidationError, loadConfig } from '../config';
import { DictionaryClient } from '../core/dictionary';
import { ReviewService } from '../core/review';
import { SchedulerError, SystemClock } from '../core/scheduler';
import { AppError } from '../core/errors';
import { closeDatabase, createDatabase } from '../storage/db';
import { VocabCardRepository } from '../storage/repositories';
import { createProgram } from './program';
import { ReadlinePrompter } from './utils/prompter';
import { dim, red, yellow } from './utils/terminal';

async function main(): Promise<void> {
  const config = loadConfig(process.env, process.argv.slice(2));
  const db = createDatabase(config.database.path);
  const clock = new SystemClock(config.scheduler.accelerationFactor);

  const program = createProgram({
    service: new ReviewService(new VocabCardRepository(db), clock, {
      efOrdering: config.scheduler.efOrdering,
    }),
    dictionary: config.dictionary.enabled
      ? new DictionaryClient({
          apiUrl: config.dictionary.apiUrl,
          translationUrl: config.dictionary.translationUrl,
          languagePair: config.dictionary.languagePair,
          timeoutMs: config.dictionary.timeoutMs,
        })
      : null,
    clock,
    testMode: config.app.testMode,
    createPrompter: () => new ReadlinePrompter(),
    sleep: (ms) => sleep(ms),
  });

  if (config.app.testMode) {
    console.log(yellow(`[TEST MODE] Time x${config.scheduler.accelerationFactor}: 1 day = ${86400 / config.scheduler.accelerationFactor}s`));
  }

  try {
    await program.parseAsync(process.argv);
  } finally {
    closeDatabase(db);
  }
}

main().catch((error: unknown) => {
  if (
    error instanceof AppError ||
    error instanceof SchedulerError ||
    error instanceof ConfigValidationError
  ) {
    console.error(red(`Error: ${error.message}`));
  } else {
    console.error(red('\nFatal error:'));
    console.error(dim(error instanceof Error ? error.message : String(error)));

    // Show stack trace in development mode
    if (process.env.DEBUG && error instanceof Error) {
      console.error(dim(error.stack ?? ''));
    }
  }

  process.exit(1);
});
