/**
 * Schema Consistency Tests
 *
 * The Drizzle table and the bootstrap DDL describe the same table; these
 * tests keep their indexes in step.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { getTableConfig } from 'drizzle-orm/sqlite-core';
import { z } from 'zod';
import { vocabCards } from '../../src/storage/schema';
import { cleanupTestDatabase, createTestContext, type TestContext } from '../setup';

const indexRowsSchema = z.array(z.object({ name: z.string(), sql: z.string() }));

describe('vocab_cards schema', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  afterEach(() => {
    cleanupTestDatabase(ctx);
  });

  function createdIndexes() {
    return indexRowsSchema.parse(
      ctx.db.$client
        .prepare(
          "SELECT name, sql FROM sqlite_master WHERE type = 'index' AND tbl_name = 'vocab_cards' AND sql IS NOT NULL ORDER BY name"
        )
        .all()
    );
  }

  it('declares the same indexes the bootstrap creates', () => {
    const declared = getTableConfig(vocabCards)
      .indexes.map((idx) => idx.config.name)
      .sort();

    expect(declared).toEqual(createdIndexes().map((row) => row.name));
  });

  it('makes words unique regardless of case', () => {
    const declared = getTableConfig(vocabCards).indexes.find(
      (idx) => idx.config.name === 'vocab_cards_word_unique'
    );
    const created = createdIndexes().find((row) => row.name === 'vocab_cards_word_unique');

    expect(declared?.config.unique).toBe(true);
    expect(created?.sql).toContain('COLLATE NOCASE');
  });
});
