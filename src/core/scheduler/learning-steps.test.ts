/**
 * Learning Step Engine Unit Tests
 */

import { describe, it, expect } from 'vitest';
import { applyLearningAction, stepDuration, LEARNING_STEP_COUNT } from './learning-steps';
import { FixedClock, DAY_MS, MINUTE_MS } from './clock';
import type { LearningSchedule } from '../models';

const now = new Date('2024-03-01T08:00:00Z');
const clock = new FixedClock(now);

function atStep(step: 1 | 2 | 3, easinessFactor = 2.5): LearningSchedule {
  return { phase: 'learning', step, easinessFactor, nextDue: now };
}

function after(ms: number): Date {
  return new Date(now.getTime() + ms);
}

describe('stepDuration', () => {
  it('is 1 minute, 10 minutes and 1 day', () => {
    expect(LEARNING_STEP_COUNT).toBe(3);
    expect(stepDuration(1)).toBe(MINUTE_MS);
    expect(stepDuration(2)).toBe(10 * MINUTE_MS);
    expect(stepDuration(3)).toBe(DAY_MS);
  });
});

describe('applyLearningAction', () => {
  it.each([1, 2, 3] as const)('regress from step %i resets to step 1', (step) => {
    const { schedule, event } = applyLearningAction(atStep(step), 'regress', clock);

    expect(schedule).toEqual({ phase: 'learning', step: 1, easinessFactor: 2.5, nextDue: after(MINUTE_MS) });
    expect(event).toEqual({ kind: 'reset', step: 1, nextDue: after(MINUTE_MS) });
  });

  it.each([
    [1, MINUTE_MS],
    [2, 10 * MINUTE_MS],
    [3, DAY_MS],
  ] as const)('repeat at step %i keeps the step and waits its duration', (step, duration) => {
    const { schedule, event } = applyLearningAction(atStep(step), 'repeat', clock);

    expect(schedule).toEqual({ phase: 'learning', step, easinessFactor: 2.5, nextDue: after(duration) });
    expect(event.kind).toBe('repeat');
  });

  it('advance from step 1 moves to step 2', () => {
    const { schedule, event } = applyLearningAction(atStep(1), 'advance', clock);

    expect(schedule).toEqual({ phase: 'learning', step: 2, easinessFactor: 2.5, nextDue: after(10 * MINUTE_MS) });
    expect(event).toEqual({ kind: 'advance', step: 2, nextDue: after(10 * MINUTE_MS) });
  });

  it('advance from step 2 moves to step 3', () => {
    const { schedule } = applyLearningAction(atStep(2), 'advance', clock);

    expect(schedule).toEqual({ phase: 'learning', step: 3, easinessFactor: 2.5, nextDue: after(DAY_MS) });
  });

  it('advance from step 3 graduates with the EF carried over', () => {
    const { schedule, event } = applyLearningAction(atStep(3, 2.04), 'advance', clock);

    expect(schedule).toEqual({
      phase: 'reviewing',
      repetitions: 1,
      intervalDays: 1,
      easinessFactor: 2.04,
      nextDue: after(DAY_MS),
    });
    expect(event).toEqual({ kind: 'graduated', intervalDays: 1, nextDue: after(DAY_MS) });
  });
});
