/**
 * Schema Bootstrap for Vocab Drill
 *
 * Creates the vocab_cards table and its indexes when they are missing. Safe
 * to run on every start: every statement is IF NOT EXISTS.
 */

import type { Database } from 'better-sqlite3';
import { SCHEMA_SQL } from './schema';

/**
 * Applies the schema to a raw SQLite connection.
 *
 * @returns Names of the user tables present afterwards
 */
export function migrate(sqlite: Database): string[] {
  sqlite.exec(SCHEMA_SQL);

  const tables = sqlite
    .prepare(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all();

  return tables.flatMap((row) =>
    typeof row === 'object' && row !== null && 'name' in row && typeof row.name === 'string'
      ? [row.name]
      : []
  );
}
