/**
 * CLI Stats Command
 *
 * Store-wide statistics: totals per phase, cards due now and the average
 * easiness factor of graduated cards.
 */

import { Command } from 'commander';
import type { CliContext } from '../context';
import { bold, formatSeparator } from '../utils/terminal';

export function createStatsCommand(context: CliContext): Command {
  return new Command('stats')
    .description('Show statistics')
    .action(async () => {
      const stats = await context.service.getStats();

      console.log(bold('Statistics'));
      console.log(formatSeparator(30));
      console.log(`  Total words: ${stats.total}`);
      console.log(`  In learning: ${stats.learning}`);
      console.log(`  Graduated (SM-2): ${stats.graduated}`);
      console.log(`  Pending now: ${stats.pending}`);
      if (stats.graduated > 0) {
        console.log(`  Average EF (graduated): ${stats.averageEasinessFactor.toFixed(2)}`);
      }
    });
}
