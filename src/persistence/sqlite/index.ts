export { openDatabase } from './database';
export { SqliteCampaignStore } from './SqliteCampaignStore';

import type Database from 'better-sqlite3';
import { openDatabase } from './database';
import { SqliteCampaignStore } from './SqliteCampaignStore';
import { SqliteContentStore } from '../../publication';

export interface SqliteStores {
  db: Database.Database;
  campaign: SqliteCampaignStore;
  content: SqliteContentStore;
}

export function createSqliteStores(dbPath?: string): SqliteStores {
  const db = openDatabase(dbPath);
  return {
    db,
    campaign: new SqliteCampaignStore(db),
    content: new SqliteContentStore(db),
  };
}
