import { loadConfig } from './Config.js';
import { LedgerServer } from './Server.js';
import { SQLiteLedgerStore } from '../infrastructure/persistence/SQLiteLedgerStore.js';

const config = loadConfig();
const store = new SQLiteLedgerStore(config.dbPath);
const server = new LedgerServer(config, store);

server.start().catch((err: unknown) => {
    console.error('[LedgerServer] Failed to start:', err);
    store.close();
    process.exit(1);
});
