/**
 * VocabCard Domain Types
 *
 * A VocabCard is a single vocabulary word the learner is memorizing. It pairs
 * the word's content (definition, part of speech, translation) with the
 * scheduling state the review scheduler reads and writes.
 *
 * The scheduling state is a tagged union over the two phases a card can be
 * in. Fields that only make sense in one phase live only on that variant, so
 * the compiler rejects reading `step` from a graduated card or `intervalDays`
 * from a card that is still learning.
 *
 * This module contains only pure TypeScript types with no runtime
 * dependencies.
 */

/**
 * The two scheduling phases.
 *
 * - 'learning': walking through the fixed short learning steps
 * - 'reviewing': graduated; intervals come from the SM-2 recurrence
 */
export type SchedulePhase = 'learning' | 'reviewing';

/**
 * Index of a learning step. Step 1 is one minute, step 2 ten minutes,
 * step 3 one day.
 */
export type LearningStep = 1 | 2 | 3;

/**
 * Schedule of a card that has not graduated yet (or has regressed after
 * forgetting a graduated word).
 */
export interface LearningSchedule {
  phase: 'learning';

  /** Current learning step. */
  step: LearningStep;

  /**
   * SM-2 easiness factor carried through the learning episode.
   * Starts at 2.5 and is never below 1.3.
   */
  easinessFactor: number;

  /** Instant from which the card is eligible for review. */
  nextDue: Date;
}

/**
 * Schedule of a graduated card governed by SM-2.
 */
export interface ReviewingSchedule {
  phase: 'reviewing';

  /** Successful SM-2 reviews since the card last (re)graduated. */
  repetitions: number;

  /** Current SM-2 interval in days, at least 1. */
  intervalDays: number;

  /** SM-2 easiness factor, never below 1.3. */
  easinessFactor: number;

  /** Instant from which the card is eligible for review. */
  nextDue: Date;
}

export type CardSchedule = LearningSchedule | ReviewingSchedule;

/**
 * A vocabulary word together with its schedule.
 *
 * @example
 * ```typescript
 * const card: VocabCard = {
 *   id: 'vc_5b0f1c2e-8a57-4d0e-9a55-0c3a1f2d7e11',
 *   word: 'diligent',
 *   partOfSpeech: 'adjective',
 *   meaning: 'Showing care and effort in one\'s work.',
 *   translation: '勤奮的',
 *   schedule: {
 *     phase: 'reviewing',
 *     repetitions: 2,
 *     intervalDays: 6,
 *     easinessFactor: 2.6,
 *     nextDue: new Date('2024-03-08T09:00:00Z'),
 *   },
 *   createdAt: new Date('2024-02-28T09:00:00Z'),
 *   updatedAt: new Date('2024-03-02T09:00:00Z'),
 * };
 * ```
 */
export interface VocabCard {
  /** Unique identifier, `vc_` followed by a UUID. */
  id: string;

  /** The word itself, trimmed. Unique across the store. */
  word: string;

  /** Part(s) of speech, e.g. 'noun/verb'. May be empty. */
  partOfSpeech: string;

  /** English definition shown when the card is revealed. */
  meaning: string;

  /** Traditional Chinese translation of the definition. May be empty. */
  translation: string;

  /** Scheduling state owned by the review scheduler. */
  schedule: CardSchedule;

  createdAt: Date;

  updatedAt: Date;
}
