/**
 * CLI Clear Command
 *
 * Deletes every word after a confirmation, or straight away with --yes.
 */

import { Command } from 'commander';
import type { CliContext } from '../context';
import { dim, green, red } from '../utils/terminal';

interface ClearOptions {
  yes?: boolean;
}

export function createClearCommand(context: CliContext): Command {
  return new Command('clear')
    .description('Delete all words')
    .option('-y, --yes', 'Skip the confirmation')
    .action(async (options: ClearOptions) => {
      if (!options.yes) {
        const prompter = context.createPrompter();
        try {
          const confirmed = await prompter.confirm(red('Delete ALL words and their progress?'));
          if (!confirmed) {
            console.log(dim('Nothing deleted.'));
            return;
          }
        } finally {
          prompter.close();
        }
      }

      const removed = await context.service.clearAll();
      console.log(green(`Deleted ${removed} word(s).`));
    });
}
