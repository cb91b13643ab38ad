/**
 * Storage Module - Barrel Export
 *
 * Public API of the storage layer: the connection factory, the table
 * definitions and the repositories.
 *
 * Usage:
 *   import { createDatabase, VocabCardRepository } from '@/storage';
 *   const repo = new VocabCardRepository(createDatabase(':memory:'));
 */

export { createDatabase, closeDatabase } from './db';
export type { AppDatabase } from './db';
export { migrate } from './migrate';

export { vocabCards } from './schema';
export type { VocabCardRow, NewVocabCardRow } from './schema';

export * from './repositories';
