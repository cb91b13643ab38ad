/**
 * Review Scheduler - Learning Steps + SM-2 State Machine
 *
 * The scheduler decides, for one card and one rating, the card's next
 * schedule and a description of the transition. It is a pure function of
 * (schedule, rating, clock): it holds no state of its own and never touches
 * storage.
 *
 * Dispatch:
 * 1. A learning card gets the structural reading of the rating and goes
 *    through the learning step engine.
 * 2. A graduated card gets the SM-2 quality of the rating and goes through
 *    the SM-2 calculator. Forgot sends it back to learning step 1.
 *
 * The scheduler does not check that the card is due. Listing due cards is
 * the store's job; reviewing early simply recomputes the schedule from now.
 */

import type { CardSchedule, LearningSchedule, ReviewingSchedule } from '../models';
import type { Clock } from './clock';
import { DAY_MS } from './clock';
import { InconsistentStateError } from './errors';
import { applyLearningAction, stepDuration } from './learning-steps';
import { toLearningAction, toQuality } from './rating';
import { calculateSm2, INITIAL_EASINESS_FACTOR, MIN_EASINESS_FACTOR } from './sm2';
import type { EfOrdering, Rating, TransitionEvent } from './types';

/**
 * Configuration options for the ReviewScheduler.
 */
export interface ReviewSchedulerConfig {
  /**
   * Which easiness factor feeds the SM-2 interval recurrence from the third
   * successful review on.
   * Default: 'before-update'
   */
  efOrdering: EfOrdering;
}

const DEFAULT_CONFIG: ReviewSchedulerConfig = {
  efOrdering: 'before-update',
};

/**
 * Result of one review.
 */
export interface ReviewResult {
  /** The card's schedule after the review. */
  schedule: CardSchedule;

  /** What happened. */
  event: TransitionEvent;
}

/**
 * Verifies the phase invariants of a schedule.
 *
 * @throws InconsistentStateError if the schedule cannot have been produced
 *   by the scheduler (step outside 1..3, interval below one day, EF below
 *   1.3, negative or fractional repetitions, invalid due instant)
 */
export function assertConsistentSchedule(schedule: CardSchedule): void {
  if (!Number.isFinite(schedule.easinessFactor) || schedule.easinessFactor < MIN_EASINESS_FACTOR) {
    throw new InconsistentStateError(
      'easinessFactor',
      schedule.easinessFactor,
      `is below the minimum of ${MIN_EASINESS_FACTOR}`
    );
  }

  if (Number.isNaN(schedule.nextDue.getTime())) {
    throw new InconsistentStateError('nextDue', schedule.nextDue, 'is not a valid instant');
  }

  if (schedule.phase === 'learning') {
    const step: number = schedule.step;
    if (!Number.isInteger(step) || step < 1 || step > 3) {
      throw new InconsistentStateError('step', step, 'is outside the learning steps 1..3');
    }
    return;
  }

  if (!Number.isFinite(schedule.intervalDays) || schedule.intervalDays < 1) {
    throw new InconsistentStateError(
      'intervalDays',
      schedule.intervalDays,
      'is below one day for a graduated card'
    );
  }

  if (!Number.isInteger(schedule.repetitions) || schedule.repetitions < 0) {
    throw new InconsistentStateError(
      'repetitions',
      schedule.repetitions,
      'is not a non-negative integer'
    );
  }
}

/**
 * ReviewScheduler applies ratings to card schedules.
 *
 * @example
 * ```typescript
 * const scheduler = new ReviewScheduler();
 * const clock = new SystemClock();
 *
 * let schedule = scheduler.createInitialSchedule(clock);
 * const { schedule: next, event } = scheduler.review(schedule, 'easy', clock);
 * // next: { phase: 'learning', step: 2, ... }, event.kind === 'advance'
 * ```
 */
export class ReviewScheduler {
  private readonly config: ReviewSchedulerConfig;

  /**
   * @param config - Optional partial configuration to override defaults
   */
  constructor(config?: Partial<ReviewSchedulerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Schedule of a freshly added card: learning step 1, EF 2.5, due one
   * step-1 duration from now.
   */
  createInitialSchedule(clock: Clock): LearningSchedule {
    return {
      phase: 'learning',
      step: 1,
      easinessFactor: INITIAL_EASINESS_FACTOR,
      nextDue: clock.deadline(stepDuration(1)),
    };
  }

  /**
   * Applies one rating to a card's schedule.
   *
   * @param schedule - The card's current schedule
   * @param rating - The learner's rating
   * @param clock - Clock supplying now and the accelerated deadlines
   * @returns The new schedule and the transition event
   * @throws InconsistentStateError if `schedule` breaks its phase invariants
   */
  review(schedule: CardSchedule, rating: Rating, clock: Clock): ReviewResult {
    assertConsistentSchedule(schedule);

    if (schedule.phase === 'learning') {
      return applyLearningAction(schedule, toLearningAction(rating), clock);
    }

    return this.reviewGraduated(schedule, rating, clock);
  }

  private reviewGraduated(
    schedule: ReviewingSchedule,
    rating: Rating,
    clock: Clock
  ): ReviewResult {
    const result = calculateSm2(
      {
        repetitions: schedule.repetitions,
        intervalDays: schedule.intervalDays,
        easinessFactor: schedule.easinessFactor,
        quality: toQuality(rating),
      },
      { efOrdering: this.config.efOrdering }
    );

    if (result.kind === 'relearn') {
      const nextDue = clock.deadline(stepDuration(1));
      return {
        schedule: {
          phase: 'learning',
          step: 1,
          easinessFactor: result.easinessFactor,
          nextDue,
        },
        event: { kind: 'relearn', step: 1, nextDue },
      };
    }

    const nextDue = clock.deadline(result.intervalDays * DAY_MS);
    return {
      schedule: {
        phase: 'reviewing',
        repetitions: result.repetitions,
        intervalDays: result.intervalDays,
        easinessFactor: result.easinessFactor,
        nextDue,
      },
      event: { kind: 'review', intervalDays: result.intervalDays, nextDue },
    };
  }
}
