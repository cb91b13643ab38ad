/**
 * Database Connection Factory for Vocab Drill
 *
 * Opens a better-sqlite3 database, makes sure the schema exists, and wraps
 * the connection with Drizzle ORM.
 *
 * Usage:
 *   import { createDatabase } from '@/storage/db';
 *
 *   const db = createDatabase(config.database.path);
 *   const testDb = createDatabase(':memory:'); // in-memory for tests
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema';
import { migrate } from './migrate';

/**
 * Creates a Drizzle ORM database instance backed by the given SQLite file.
 *
 * @param dbPath - Path to the SQLite database file, or ':memory:'.
 * @returns A Drizzle ORM database instance with full schema awareness
 *
 * @example
 * const db = createDatabase('vocab.db');
 */
export function createDatabase(dbPath: string = 'vocab.db') {
  const sqlite = new Database(dbPath);

  // WAL needs a file
  if (dbPath !== ':memory:') {
    sqlite.pragma('journal_mode = WAL');
  }

  migrate(sqlite);

  return drizzle(sqlite, { schema });
}

/**
 * Type alias for the Drizzle database instance.
 */
export type AppDatabase = ReturnType<typeof createDatabase>;

/**
 * Closes the SQLite connection underneath a Drizzle instance.
 */
export function closeDatabase(db: AppDatabase): void {
  db.$client.close();
}
