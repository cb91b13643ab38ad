/**
 * Repository Layer - Barrel Export
 *
 * @example
 * ```typescript
 * import { VocabCardRepository } from '@/storage/repositories';
 *
 * const cards = new VocabCardRepository(db);
 * ```
 */

// Base repository interface
export type { Repository } from './base';

// VocabCard repository and types
export {
  VocabCardRepository,
  type CreateVocabCardInput,
  type UpdateVocabCardInput,
  type VocabCardStats,
} from './vocab-card.repository';
