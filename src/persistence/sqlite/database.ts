/**
 * SQLite database initialization.
 * Opens the database, enables WAL mode, and runs schema migrations.
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';

const SCHEMA_SQL = `
-- campaigns (ICampaignStore)
CREATE TABLE IF NOT EXISTS campaigns (
  guid                 TEXT PRIMARY KEY,
  created_at           TEXT NOT NULL,
  total_amount         TEXT NOT NULL,
  number_of_recipients INTEGER NOT NULL,
  decimals             INTEGER NOT NULL,
  root                 TEXT,
  cid                  TEXT
);

-- recipients (one row per CSV entry, in file order)
CREATE TABLE IF NOT EXISTS recipients (
  campaign_guid TEXT NOT NULL REFERENCES campaigns(guid) ON DELETE CASCADE,
  position      INTEGER NOT NULL,
  address       TEXT NOT NULL,
  amount        TEXT NOT NULL,
  PRIMARY KEY (campaign_guid, position)
);

-- documents (SqliteContentStore)
CREATE TABLE IF NOT EXISTS documents (
  cid        TEXT PRIMARY KEY,
  body       TEXT NOT NULL,
  created_at TEXT NOT NULL
);
`;

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? path.join(process.cwd(), 'data', 'airdrop.db');

  if (resolvedPath !== ':memory:') {
    const dir = path.dirname(resolvedPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(resolvedPath);

  // WAL mode for better concurrent read performance
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(SCHEMA_SQL);

  return db;
}
