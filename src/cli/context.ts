/**
 * CLI Context
 *
 * Everything a CLI command needs, created once by the entry point and
 * passed to each command factory. Tests build one over an in-memory
 * database, a fixed clock and a scripted prompter.
 */

import type { DictionaryClient } from '@/core/dictionary';
import type { ReviewService } from '@/core/review';
import type { Clock } from '@/core/scheduler';
import type { InteractivePrompter } from './utils/prompter';

export interface CliContext {
  service: ReviewService;

  /** null when lookups are disabled by configuration */
  dictionary: DictionaryClient | null;

  clock: Clock;

  /** Accelerated time; enables the `wait` command */
  testMode: boolean;

  /** Opens a prompter for interactive commands; the caller closes it */
  createPrompter: () => InteractivePrompter;

  /** Real-time pause used by `wait` */
  sleep: (ms: number) => Promise<void>;
}
