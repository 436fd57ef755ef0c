// Storage interfaces
export {
  ICampaignStore,
  CampaignRecord,
  NewCampaign,
  StoredRecipient,
  RecipientPage,
  MAX_PAGE_SIZE,
  isValidPage,
  assertValidPage,
} from './interfaces';

// In-memory stores
export { InMemoryCampaignStore } from './inMemoryStores';

// SQLite stores
export { openDatabase, SqliteCampaignStore, createSqliteStores } from './sqlite';
export type { SqliteStores } from './sqlite';
