/**
 * Review Scheduler Type Definitions
 *
 * Ratings, learning actions, SM-2 quality values and the transition events
 * the scheduler reports back to its callers.
 */

import type { LearningStep } from '../models';

/**
 * User-facing rating for a review.
 *
 * Only three discrete ratings exist. During learning they steer the step
 * machine; once graduated they map to SM-2 quality values.
 *
 * - 'forgot': could not recall the word
 * - 'hard': recalled with difficulty
 * - 'easy': recalled without effort
 */
export type Rating = 'forgot' | 'hard' | 'easy';

/**
 * How a rating steers a card that is still in the learning phase.
 */
export type LearningAction = 'regress' | 'repeat' | 'advance';

/**
 * SM-2 quality values. Forgot maps to 0, Hard to 3 and Easy to 5; no other
 * value is ever produced.
 */
export type Sm2Quality = 0 | 3 | 5;

/**
 * Result of interpreting a rating against the phase of the card it applies to.
 */
export type RatingInterpretation =
  | { phase: 'learning'; action: LearningAction }
  | { phase: 'reviewing'; quality: Sm2Quality };

/**
 * Which easiness factor feeds the `I' = ceil(I * EF)` recurrence.
 *
 * - 'before-update': the EF the card had when the review started (classical SM-2)
 * - 'after-update': the EF after this review's adjustment
 */
export type EfOrdering = 'before-update' | 'after-update';

/**
 * What happened to a card during one review.
 *
 * Every variant carries the due instant it produced so callers can render
 * feedback without re-reading the state.
 */
export type TransitionEvent =
  | { kind: 'reset'; step: 1; nextDue: Date }
  | { kind: 'repeat'; step: LearningStep; nextDue: Date }
  | { kind: 'advance'; step: LearningStep; nextDue: Date }
  | { kind: 'graduated'; intervalDays: 1; nextDue: Date }
  | { kind: 'relearn'; step: 1; nextDue: Date }
  | { kind: 'review'; intervalDays: number; nextDue: Date };
