/**
 * CLI List Command
 *
 * Lists every word alphabetically with its meaning and schedule.
 */

import { Command } from 'commander';
import type { CliContext } from '../context';
import { bold, dim, formatSchedule, formatWordHeading, yellow } from '../utils/terminal';

export function createListCommand(context: CliContext): Command {
  return new Command('list')
    .alias('ls')
    .description('List all words')
    .action(async () => {
      const cards = await context.service.listAll();

      if (cards.length === 0) {
        console.log(yellow("No words yet. Use 'add' to add some!"));
        return;
      }

      console.log(bold(`All Words (${cards.length})`));
      for (const card of cards) {
        console.log(`  ${formatWordHeading(card)}: ${card.meaning}`);
        if (card.translation) {
          console.log(`    ${card.translation}`);
        }
        console.log(`    ${dim(formatSchedule(card.schedule, context.clock))}`);
      }
    });
}
