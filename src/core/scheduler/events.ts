/**
 * Transition Event Rendering
 *
 * Turns the scheduler's structured events into the short status texts shown
 * after a review.
 */

import { DAY_MS, MINUTE_MS } from './clock';
import { LEARNING_STEP_COUNT, stepDuration } from './learning-steps';
import type { TransitionEvent } from './types';

/**
 * One-line description of a transition.
 *
 * @example
 * ```typescript
 * describeEvent({ kind: 'review', intervalDays: 6, nextDue }); // 'reviewing, interval now 6 day(s)'
 * ```
 */
export function describeEvent(event: TransitionEvent): string {
  switch (event.kind) {
    case 'reset':
      return 'reset to step 1';
    case 'repeat':
      return `repeat step ${event.step}`;
    case 'advance':
      return `advance to step ${event.step}`;
    case 'graduated':
      return 'graduated';
    case 'relearn':
      return 'back to learning';
    case 'review':
      return `reviewing, interval now ${event.intervalDays} day(s)`;
  }
}

/**
 * Formats a nominal duration the way learners think about it: minutes below
 * a day, days from there on.
 */
export function formatNominalDuration(durationMs: number): string {
  if (durationMs < DAY_MS) {
    return `${Math.round(durationMs / MINUTE_MS)}min`;
  }
  const days = Math.round(durationMs / DAY_MS);
  return `${days} day${days === 1 ? '' : 's'}`;
}

/**
 * Feedback line printed after a review, e.g.
 * 'Step 2/3 - review in 10min' or 'Next review in 6 day(s)'.
 *
 * Durations are nominal; with an accelerated clock the real wait is shorter.
 */
export function formatFeedback(event: TransitionEvent): string {
  switch (event.kind) {
    case 'reset':
      return `Reset to step 1 - review in ${formatNominalDuration(stepDuration(1))}`;
    case 'repeat':
      return `Repeat step ${event.step} - review in ${formatNominalDuration(stepDuration(event.step))}`;
    case 'advance':
      return `Step ${event.step}/${LEARNING_STEP_COUNT} - review in ${formatNominalDuration(stepDuration(event.step))}`;
    case 'graduated':
      return 'Graduated! Next review in 1 day';
    case 'relearn':
      return `Back to learning - review in ${formatNominalDuration(stepDuration(1))}`;
    case 'review':
      return `Next review in ${event.intervalDays} day(s)`;
  }
}
