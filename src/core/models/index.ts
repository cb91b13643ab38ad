/**
 * Core Domain Models - Barrel Export
 *
 * Re-exports the domain types shared by the scheduler, the word store and
 * the outer surfaces. These types have no runtime dependencies.
 *
 * @example
 * ```typescript
 * import type { VocabCard, CardSchedule } from '@/core/models';
 * ```
 */

// VocabCard types - a word and its review schedule
export type {
  SchedulePhase,
  LearningStep,
  LearningSchedule,
  ReviewingSchedule,
  CardSchedule,
  VocabCard,
} from './vocab-card';
