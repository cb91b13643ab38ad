/**
 * Transition Event Rendering Tests
 */

import { describe, it, expect } from 'vitest';
import { describeEvent, formatFeedback, formatNominalDuration } from './events';
import { DAY_MS, MINUTE_MS } from './clock';

const nextDue = new Date('2024-01-16T10:00:00Z');

describe('describeEvent', () => {
  it('names every transition', () => {
    expect(describeEvent({ kind: 'reset', step: 1, nextDue })).toBe('reset to step 1');
    expect(describeEvent({ kind: 'repeat', step: 2, nextDue })).toBe('repeat step 2');
    expect(describeEvent({ kind: 'advance', step: 3, nextDue })).toBe('advance to step 3');
    expect(describeEvent({ kind: 'graduated', intervalDays: 1, nextDue })).toBe('graduated');
    expect(describeEvent({ kind: 'relearn', step: 1, nextDue })).toBe('back to learning');
    expect(describeEvent({ kind: 'review', intervalDays: 6, nextDue })).toBe(
      'reviewing, interval now 6 day(s)'
    );
  });
});

describe('formatFeedback', () => {
  it('mentions the nominal wait', () => {
    expect(formatFeedback({ kind: 'reset', step: 1, nextDue })).toBe('Reset to step 1 - review in 1min');
    expect(formatFeedback({ kind: 'repeat', step: 1, nextDue })).toBe('Repeat step 1 - review in 1min');
    expect(formatFeedback({ kind: 'advance', step: 2, nextDue })).toBe('Step 2/3 - review in 10min');
    expect(formatFeedback({ kind: 'advance', step: 3, nextDue })).toBe('Step 3/3 - review in 1 day');
    expect(formatFeedback({ kind: 'graduated', intervalDays: 1, nextDue })).toBe(
      'Graduated! Next review in 1 day'
    );
    expect(formatFeedback({ kind: 'relearn', step: 1, nextDue })).toBe('Back to learning - review in 1min');
    expect(formatFeedback({ kind: 'review', intervalDays: 15, nextDue })).toBe('Next review in 15 day(s)');
  });
});

describe('formatNominalDuration', () => {
  it('uses minutes below a day and days from there', () => {
    expect(formatNominalDuration(10 * MINUTE_MS)).toBe('10min');
    expect(formatNominalDuration(DAY_MS)).toBe('1 day');
    expect(formatNominalDuration(6 * DAY_MS)).toBe('6 days');
  });
});
