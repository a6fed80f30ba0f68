/**
 * Registry database connection and schema
 *
 * One SQLite file holds both the hypothesis registry and the local ledger
 * receipts. Pass ':memory:' for an in-process database.
 *
 * @module services/storage/database
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';

export const REGISTRY_DB_FILENAME = 'registry.db';

export const SCHEMA_VERSION = 1;

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS hypotheses (
  hypothesis_id TEXT PRIMARY KEY,
  primary_synergy_id TEXT NOT NULL,
  confidence TEXT NOT NULL CHECK (confidence IN ('low', 'medium', 'high')),
  content_hash TEXT NOT NULL,
  author_id TEXT NOT NULL,
  created_at TEXT NOT NULL,
  ledger_tx_id TEXT,
  payload TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_hypotheses_synergy ON hypotheses(primary_synergy_id);
CREATE INDEX IF NOT EXISTS idx_hypotheses_created ON hypotheses(created_at);

CREATE TABLE IF NOT EXISTS ledger_receipts (
  tx_id TEXT PRIMARY KEY,
  hypothesis_id TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  author_id TEXT NOT NULL,
  recorded_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_ledger_hypothesis ON ledger_receipts(hypothesis_id);
`;

/**
 * Open (creating if needed) the registry database at `location`.
 *
 * @param location - file path, or ':memory:'
 */
export function openRegistryDatabase(location: string): Database.Database {
  if (location !== ':memory:') {
    fs.mkdirSync(path.dirname(location), { recursive: true });
  }

  const db = new Database(location);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA_SQL);

  const row = db.prepare('SELECT version FROM schema_version LIMIT 1').get();
  if (row === undefined) {
    db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  }

  console.error(`[Registry] Opened ${location} (schema v${SCHEMA_VERSION})`);
  return db;
}
