/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI escape code wrappers for colorizing and formatting terminal output,
 * plus the formatters for cards and schedules shown by the CLI commands.
 *
 * Usage:
 * ```typescript
 * import { bold, green, yellow, formatSchedule } from './terminal';
 *
 * console.log(bold('Review Session'));
 * console.log(green('Graduated! Next review in 1 day'));
 * console.log(formatSchedule(card.schedule, clock));
 * ```
 *
 * Note: These escape codes are universally supported in modern terminals.
 * In non-TTY environments, the codes pass through harmlessly.
 */

import type { CardSchedule, VocabCard } from '@/core/models';
import { formatTimeUntil, LEARNING_STEP_COUNT, type Clock } from '@/core/scheduler';

// =============================================================================
// Text Style Modifiers
// =============================================================================

/**
 * Makes text bold/bright in the terminal.
 *
 * @example
 * console.log(bold('Session Complete!'));
 */
export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

/**
 * Makes text dim/faded in the terminal.
 * Use for secondary information like hints, timestamps, or IDs.
 */
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

// =============================================================================
// Color Functions
// =============================================================================

/** Success messages, graduated cards. */
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

/** Warnings, cards still learning. */
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

/** Errors, forgotten cards. */
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

/** The revealed answer. */
export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

// =============================================================================
// Semantic Formatters
// =============================================================================

/**
 * Formats a horizontal separator line for visual section breaks.
 *
 * @example
 * console.log(formatSeparator());
 * // Output: "──────────────────────────────────────────────────"
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/**
 * Formats command help text for display.
 *
 * @example
 * console.log(formatCommandHelp('1', 'Forgot'));
 * // Output: "  1          - Forgot"
 */
export function formatCommandHelp(command: string, description: string): string {
  return `  ${yellow(command.padEnd(10))} - ${dim(description)}`;
}

/**
 * Short phase label, e.g. 'learning (step 2/3)' or 'reviewing (reps: 4)'.
 */
export function formatPhase(schedule: CardSchedule): string {
  return schedule.phase === 'learning'
    ? `learning (step ${schedule.step}/${LEARNING_STEP_COUNT})`
    : `reviewing (reps: ${schedule.repetitions})`;
}

/**
 * Full schedule line for `list`, with time until the next review on the
 * given clock.
 *
 * @example
 * formatSchedule(card.schedule, clock);
 * // '[SM-2] reps: 2, interval: 6d, EF: 2.60, next: 6d'
 */
export function formatSchedule(schedule: CardSchedule, clock: Clock): string {
  const next = formatTimeUntil(schedule.nextDue, clock);
  if (schedule.phase === 'learning') {
    return `[Learning step ${schedule.step}/${LEARNING_STEP_COUNT}] next: ${next}`;
  }
  return (
    `[SM-2] reps: ${schedule.repetitions}, interval: ${schedule.intervalDays}d, ` +
    `EF: ${schedule.easinessFactor.toFixed(2)}, next: ${next}`
  );
}

/**
 * "word (pos)" heading of a card.
 */
export function formatWordHeading(card: VocabCard): string {
  return card.partOfSpeech ? `${bold(card.word)} (${card.partOfSpeech})` : bold(card.word);
}

/**
 * Prints a blank line for visual spacing.
 */
export function printBlankLine(): void {
  console.log();
}

/**
 * Banner shown when a review session starts.
 */
export function printSessionBanner(dueCount: number): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(bold(`  Review Session: ${dueCount} word(s)`));
  console.log(formatSeparator(60));
  console.log(formatCommandHelp('1', 'Forgot'));
  console.log(formatCommandHelp('2', 'Hard'));
  console.log(formatCommandHelp('3', 'Easy'));
  console.log(formatCommandHelp('q', 'Quit'));
  printBlankLine();
}

/**
 * Prints a session completion summary.
 */
export function printSessionComplete(reviewed: number): void {
  printBlankLine();
  console.log(formatSeparator(60));
  console.log(green(bold('  Session Complete!')));
  console.log(`  Reviewed ${yellow(reviewed.toString())} word(s).`);
  console.log(formatSeparator(60));
  printBlankLine();
}

/**
 * Prints the summary of a session ended early by the learner.
 */
export function printSessionEnded(reviewed: number): void {
  printBlankLine();
  console.log(yellow(`Session ended. Reviewed ${reviewed} word(s).`));
  console.log(dim('Ratings already given are saved.'));
  printBlankLine();
}
