/**
 * CLI Delete Command
 */

import { Command } from 'commander';
import type { CliContext } from '../context';
import { green } from '../utils/terminal';

export function createDeleteCommand(context: CliContext): Command {
  return new Command('delete')
    .alias('rm')
    .description('Delete a word')
    .argument('<word>', 'The word to delete')
    .action(async (word: string) => {
      const card = await context.service.findByWord(word);
      await context.service.deleteCard(card.id);
      console.log(green(`Deleted: '${card.word}'`));
    });
}
