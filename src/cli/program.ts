/**
 * CLI Program
 *
 * Builds the commander program with every command wired to a CliContext.
 * The entry point parses process.argv with it; tests parse scripted argv.
 */

import { Command } from 'commander';
import type { CliContext } from './context';
import { createAddCommand } from './commands/add';
import { createClearCommand } from './commands/clear';
import { createDeleteCommand } from './commands/delete';
import { createListCommand } from './commands/list';
import { createPendingCommand } from './commands/pending';
import { createReviewCommand } from './commands/review';
import { createStatsCommand } from './commands/stats';
import { createWaitCommand } from './commands/wait';

export const PROGRAM_NAME = 'vocab-drill';

export function createProgram(context: CliContext): Command {
  const program = new Command(PROGRAM_NAME)
    .description('Vocabulary trainer with learning steps and SM-2 reviews')
    // Read by the configuration loader; declared so commander accepts it
    .option('--test', 'Accelerated time (x1000) with a separate database')
    .showHelpAfterError();

  program.addCommand(createAddCommand(context));
  program.addCommand(createPendingCommand(context));
  program.addCommand(createReviewCommand(context));
  program.addCommand(createListCommand(context));
  program.addCommand(createStatsCommand(context));
  program.addCommand(createDeleteCommand(context));
  program.addCommand(createClearCommand(context));
  program.addCommand(createWaitCommand(context));

  return program;
}
