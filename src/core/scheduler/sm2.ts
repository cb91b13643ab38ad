/**
 * SM-2 Interval Calculator
 *
 * Implements the SuperMemo-2 recurrence for graduated cards:
 *
 *   I(1) = 1 day
 *   I(2) = 6 days
 *   I(n) = ceil(I(n-1) * EF)            for n >= 3
 *   EF'  = EF + (0.1 - (5-q) * (0.08 + (5-q) * 0.02)),  floored at 1.3
 *
 * Quality 0 (forgot) does not produce an interval: the card goes back to
 * learning step 1 with its EF untouched.
 *
 * The output depends only on the inputs. EF is rounded to two decimals after
 * every update; all deltas are whole hundredths, so this removes binary
 * floating-point drift (2.5 - 0.14 is stored as 2.36, not 2.3600000000000003).
 */

import type { Sm2Quality, EfOrdering } from './types';

/** Easiness factor of a brand new card. */
export const INITIAL_EASINESS_FACTOR = 2.5;

/** Lower bound of the easiness factor. */
export const MIN_EASINESS_FACTOR = 1.3;

/** Interval after the first successful review, in days. */
export const FIRST_INTERVAL_DAYS = 1;

/** Interval after the second successful review, in days. */
export const SECOND_INTERVAL_DAYS = 6;

/**
 * Input to one SM-2 step.
 */
export interface Sm2Input {
  repetitions: number;
  intervalDays: number;
  easinessFactor: number;
  quality: Sm2Quality;
}

/**
 * Result of one SM-2 step: either the next interval, or a signal that the
 * card was forgotten and must relearn.
 */
export type Sm2Result =
  | {
      kind: 'review';
      repetitions: number;
      intervalDays: number;
      easinessFactor: number;
    }
  | { kind: 'relearn'; easinessFactor: number };

export interface Sm2Options {
  /** Which EF feeds the interval recurrence. Defaults to 'before-update'. */
  efOrdering?: EfOrdering;
}

function roundToHundredths(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Applies the SM-2 easiness factor update for a quality value.
 *
 * q=5 adds 0.1, q=3 subtracts 0.14, q=0 subtracts 0.8. The result never
 * drops below 1.3 and has no ceiling.
 */
export function updateEasinessFactor(easinessFactor: number, quality: Sm2Quality): number {
  const miss = 5 - quality;
  const delta = 0.1 - miss * (0.08 + miss * 0.02);
  return Math.max(MIN_EASINESS_FACTOR, roundToHundredths(easinessFactor + delta));
}

/**
 * Computes the next SM-2 schedule for a graduated card.
 *
 * @example
 * ```typescript
 * calculateSm2({ repetitions: 1, intervalDays: 1, easinessFactor: 2.5, quality: 5 });
 * // { kind: 'review', repetitions: 2, intervalDays: 6, easinessFactor: 2.6 }
 * ```
 */
export function calculateSm2(input: Sm2Input, options: Sm2Options = {}): Sm2Result {
  const { repetitions, intervalDays, easinessFactor, quality } = input;

  if (quality === 0) {
    return { kind: 'relearn', easinessFactor };
  }

  const nextEasinessFactor = updateEasinessFactor(easinessFactor, quality);
  const nextRepetitions = repetitions + 1;

  let nextInterval: number;
  if (nextRepetitions === 1) {
    nextInterval = FIRST_INTERVAL_DAYS;
  } else if (nextRepetitions === 2) {
    nextInterval = SECOND_INTERVAL_DAYS;
  } else {
    const factor =
      (options.efOrdering ?? 'before-update') === 'after-update'
        ? nextEasinessFactor
        : easinessFactor;
    nextInterval = Math.ceil(intervalDays * factor);
  }

  return {
    kind: 'review',
    repetitions: nextRepetitions,
    intervalDays: nextInterval,
    easinessFactor: nextEasinessFactor,
  };
}
