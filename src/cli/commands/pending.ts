/**
 * CLI Pending Command
 *
 * Lists the words due for review, earliest first.
 */

import { Command } from 'commander';
import type { CliContext } from '../context';
import { bold, dim, formatPhase, green } from '../utils/terminal';

export function createPendingCommand(context: CliContext): Command {
  return new Command('pending')
    .description('Show words due for review')
    .action(async () => {
      const due = await context.service.listDue();

      if (due.length === 0) {
        console.log(green('No words pending for review. Great job!'));
        return;
      }

      console.log(bold(`Pending Reviews: ${due.length} word(s)`));
      for (const card of due) {
        console.log(`  - ${card.word} ${dim(`[${formatPhase(card.schedule)}]`)}`);
      }
    });
}
