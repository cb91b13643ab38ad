/**
 * Review Scheduler Module - Barrel Export
 *
 * Hybrid spaced-repetition scheduler: Anki-style learning steps for new
 * cards, SM-2 intervals once graduated.
 *
 * @example
 * ```typescript
 * import { ReviewScheduler, SystemClock, parseRating } from '@/core/scheduler';
 *
 * const scheduler = new ReviewScheduler();
 * const clock = new SystemClock();
 * const { schedule, event } = scheduler.review(card.schedule, parseRating('3'), clock);
 * ```
 */

export {
  ReviewScheduler,
  assertConsistentSchedule,
  type ReviewSchedulerConfig,
  type ReviewResult,
} from './scheduler';

export {
  SystemClock,
  FixedClock,
  formatTimeUntil,
  scaleDuration,
  TEST_ACCELERATION_FACTOR,
  MINUTE_MS,
  HOUR_MS,
  DAY_MS,
  type Clock,
} from './clock';

export {
  parseRating,
  toLearningAction,
  toQuality,
  interpretRating,
} from './rating';

export {
  applyLearningAction,
  stepDuration,
  LEARNING_STEP_DURATIONS_MS,
  LEARNING_STEP_COUNT,
  GRADUATION_INTERVAL_DAYS,
  type LearningStepResult,
} from './learning-steps';

export {
  calculateSm2,
  updateEasinessFactor,
  INITIAL_EASINESS_FACTOR,
  MIN_EASINESS_FACTOR,
  type Sm2Input,
  type Sm2Result,
  type Sm2Options,
} from './sm2';

export { describeEvent, formatFeedback, formatNominalDuration } from './events';

export {
  SchedulerError,
  InvalidRatingError,
  InconsistentStateError,
  SchedulerErrorCodes,
  type SchedulerErrorCode,
} from './errors';

export {
  type Rating,
  type LearningAction,
  type Sm2Quality,
  type RatingInterpretation,
  type EfOrdering,
  type TransitionEvent,
} from './types';
