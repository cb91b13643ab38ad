/**
 * CLI Review Command
 *
 * Interactive review session over the words due now. Rate each word with
 * 1 (forgot), 2 (hard) or 3 (easy); q or Ctrl+C ends the session and keeps
 * the ratings already given.
 */

import { Command } from 'commander';
import { runReviewSession } from '@/core/review';
import type { CliContext } from '../context';
import { green, printSessionBanner, printSessionComplete, printSessionEnded } from '../utils/terminal';

export function createReviewCommand(context: CliContext): Command {
  return new Command('review')
    .description('Start a review session')
    .action(async () => {
      const due = await context.service.listDue();
      if (due.length === 0) {
        console.log(green('No words pending for review. Great job!'));
        return;
      }

      printSessionBanner(due.length);

      const prompter = context.createPrompter();
      try {
        const summary = await runReviewSession(context.service, prompter, {
          signal: prompter.signal,
        });

        if (summary.completed) {
          printSessionComplete(summary.reviewed);
        } else {
          printSessionEnded(summary.reviewed);
        }
      } finally {
        prompter.close();
      }
    });
}
