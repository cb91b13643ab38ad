/**
 * Database Schema Definitions for Vocab Drill
 *
 * Drizzle ORM schema for SQLite. A single table holds every vocabulary card:
 * the word's content columns, owned by the word store, and the schedule
 * columns, read and written by the review scheduler.
 *
 * The schedule is a tagged union in the domain model and flat columns here.
 * `phase` is the tag; `learning_step` is meaningful only while learning
 * (0 once graduated) and `repetitions` / `interval_days` only once graduated.
 *
 * All timestamps are stored as milliseconds since epoch (integer).
 */

import { sql } from 'drizzle-orm';
import { sqliteTable, text, integer, real, index, uniqueIndex } from 'drizzle-orm/sqlite-core';

/**
 * Vocab Cards Table
 *
 * Phase values:
 * - 'learning': walking the learning steps (learning_step 1..3)
 * - 'reviewing': graduated to SM-2 intervals (learning_step 0)
 */
export const vocabCards = sqliteTable(
  'vocab_cards',
  {
    // Unique identifier (vc_<uuid>)
    id: text('id').primaryKey(),

    // The word itself; unique regardless of case
    word: text('word').notNull(),

    // Part(s) of speech, e.g. 'noun/verb'
    partOfSpeech: text('part_of_speech').notNull().default(''),

    // English definition
    meaning: text('meaning').notNull(),

    // Traditional Chinese translation of the definition
    translation: text('translation').notNull().default(''),

    phase: text('phase', { enum: ['learning', 'reviewing'] })
      .notNull()
      .default('learning'),

    learningStep: integer('learning_step').notNull().default(1),

    repetitions: integer('repetitions').notNull().default(0),

    intervalDays: real('interval_days').notNull().default(1),

    easinessFactor: real('easiness_factor').notNull().default(2.5),

    // When the card becomes eligible for review
    nextDue: integer('next_due', { mode: 'timestamp_ms' }).notNull(),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),

    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => ({
    wordUnique: uniqueIndex('vocab_cards_word_unique').on(sql`${table.word} COLLATE NOCASE`),
    nextDueIdx: index('vocab_cards_next_due_idx').on(table.nextDue),
  })
);

// Inferred row types
export type VocabCardRow = typeof vocabCards.$inferSelect;
export type NewVocabCardRow = typeof vocabCards.$inferInsert;

/**
 * DDL that creates the schema on an empty database. Kept next to the table
 * definition above; both must describe the same columns and indexes.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS vocab_cards (
  id TEXT PRIMARY KEY NOT NULL,
  word TEXT NOT NULL,
  part_of_speech TEXT NOT NULL DEFAULT '',
  meaning TEXT NOT NULL,
  translation TEXT NOT NULL DEFAULT '',
  phase TEXT NOT NULL DEFAULT 'learning',
  learning_step INTEGER NOT NULL DEFAULT 1,
  repetitions INTEGER NOT NULL DEFAULT 0,
  interval_days REAL NOT NULL DEFAULT 1,
  easiness_factor REAL NOT NULL DEFAULT 2.5,
  next_due INTEGER NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS vocab_cards_word_unique ON vocab_cards (word COLLATE NOCASE);
CREATE INDEX IF NOT EXISTS vocab_cards_next_due_idx ON vocab_cards (next_due);
`;
