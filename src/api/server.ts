import { createApp } from './app';
import { createApiState, ApiState } from './state';
import { loadConfig } from '../config';
import { InMemoryCampaignStore, createSqliteStores } from '../persistence';
import { IContentStore, InMemoryContentStore, PinataContentStore } from '../publication';

async function main() {
  const config = loadConfig();

  let state: ApiState;
  let closeDb: (() => void) | undefined;

  if (config.storeBackend === 'sqlite') {
    const sqlite = createSqliteStores(config.dbPath);
    closeDb = () => sqlite.db.close();

    const content: IContentStore = config.pinata
      ? new PinataContentStore(config.pinata)
      : sqlite.content;
    state = createApiState({ campaign: sqlite.campaign, content }, config);
    console.log(`SQLite database: ${config.dbPath}`);
  } else {
    const content: IContentStore = config.pinata
      ? new PinataContentStore(config.pinata)
      : new InMemoryContentStore();
    state = createApiState({ campaign: new InMemoryCampaignStore(), content }, config);
    console.log('Using in-memory stores (data will not persist)');
  }

  const app = createApp(state, { maxUploadBytes: config.maxUploadBytes });

  const server = app.listen(config.port, () => {
    console.log(`Airdrop Merkle API server running on port ${config.port}`);
    console.log(`Store backend: ${config.storeBackend}`);
    console.log(`Publication backend: ${config.publicationBackend}`);
    console.log(`Bearer token: ${config.usingDefaultToken ? 'test-bearer-token (default)' : '[SET]'}`);
    console.log(`Health check: http://localhost:${config.port}/health`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('Shutting down...');
    server.close(() => {
      closeDb?.();
      console.log('Server stopped.');
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(err => {
  console.error('Startup failed:', err);
  process.exit(1);
});
