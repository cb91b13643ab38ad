/**
 * Learning Step Engine
 *
 * New cards (and cards that were forgotten after graduating) rehearse through
 * three fixed steps before SM-2 takes over: 1 minute, 10 minutes, 1 day.
 * Easy on step 3 graduates the card.
 */

import type { LearningSchedule, LearningStep, ReviewingSchedule } from '../models';
import type { Clock } from './clock';
import { DAY_MS, MINUTE_MS } from './clock';
import type { LearningAction, TransitionEvent } from './types';

/** Nominal duration of each learning step, indexed by step - 1. */
export const LEARNING_STEP_DURATIONS_MS: readonly [number, number, number] = [
  1 * MINUTE_MS,
  10 * MINUTE_MS,
  1 * DAY_MS,
];

/** Number of learning steps a card passes through before graduating. */
export const LEARNING_STEP_COUNT = LEARNING_STEP_DURATIONS_MS.length;

/** Interval assigned on graduation, in days. */
export const GRADUATION_INTERVAL_DAYS = 1;

/**
 * Returns the nominal duration of a learning step.
 */
export function stepDuration(step: LearningStep): number {
  return LEARNING_STEP_DURATIONS_MS[step - 1];
}

/**
 * Outcome of applying one learning action.
 */
export interface LearningStepResult {
  schedule: LearningSchedule | ReviewingSchedule;
  event: TransitionEvent;
}

/**
 * Applies a learning action to a card in the learning phase.
 *
 * - regress: back to step 1, due after the step-1 duration
 * - repeat: same step, due after the current step's duration
 * - advance: next step, due after that step's duration; from step 3 the card
 *   graduates with one repetition, a one-day interval and its EF unchanged
 *
 * @param schedule - The card's current learning schedule
 * @param action - The structural interpretation of the rating
 * @param clock - Clock supplying now and the accelerated deadline
 */
export function applyLearningAction(
  schedule: LearningSchedule,
  action: LearningAction,
  clock: Clock
): LearningStepResult {
  switch (action) {
    case 'regress': {
      const nextDue = clock.deadline(stepDuration(1));
      return {
        schedule: { ...schedule, step: 1, nextDue },
        event: { kind: 'reset', step: 1, nextDue },
      };
    }

    case 'repeat': {
      const nextDue = clock.deadline(stepDuration(schedule.step));
      return {
        schedule: { ...schedule, nextDue },
        event: { kind: 'repeat', step: schedule.step, nextDue },
      };
    }

    case 'advance': {
      if (schedule.step === 3) {
        const nextDue = clock.deadline(GRADUATION_INTERVAL_DAYS * DAY_MS);
        return {
          schedule: {
            phase: 'reviewing',
            repetitions: 1,
            intervalDays: GRADUATION_INTERVAL_DAYS,
            easinessFactor: schedule.easinessFactor,
            nextDue,
          },
          event: { kind: 'graduated', intervalDays: GRADUATION_INTERVAL_DAYS, nextDue },
        };
      }

      const step: LearningStep = schedule.step === 1 ? 2 : 3;
      const nextDue = clock.deadline(stepDuration(step));
      return {
        schedule: { ...schedule, step, nextDue },
        event: { kind: 'advance', step, nextDue },
      };
    }
  }
}
