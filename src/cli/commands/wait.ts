/**
 * CLI Wait Command
 *
 * Sleeps for a number of real seconds so accelerated schedules can come due
 * between commands. Only available in test mode.
 */

import { Command } from 'commander';
import { ValidationError } from '@/core/errors';
import type { CliContext } from '../context';
import { dim } from '../utils/terminal';

export function createWaitCommand(context: CliContext): Command {
  return new Command('wait')
    .description('Wait N real seconds (test mode only)')
    .argument('[seconds]', 'Seconds to wait', '1')
    .action(async (seconds: string) => {
      if (!context.testMode) {
        throw new ValidationError('The wait command is only available in test mode (--test).');
      }

      const waitSeconds = Number(seconds);
      if (!Number.isFinite(waitSeconds) || waitSeconds < 0) {
        throw new ValidationError(`Invalid number of seconds: '${seconds}'`, { field: 'seconds' });
      }

      console.log(dim(`Waiting ${waitSeconds}s...`));
      await context.sleep(waitSeconds * 1000);
      console.log(dim('done.'));
    });
}
