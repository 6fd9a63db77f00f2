import type { Server } from 'http';
import type { Logger } from 'pino';
import type { Config } from './config/schema.js';
import { getLogger } from './observability/logger.js';
import { createDatabaseAdapter, type DatabaseAdapter } from './persistence/database.js';
import { ExpenseLedger } from './expenses/ledger.js';
import { createExpenseStore, type ExpenseStore } from './expenses/stores/expense-store.js';
import { createExpenseServer } from './http/server.js';

export interface ExpenseApp {
  adapter: DatabaseAdapter | null;
  store: ExpenseStore;
  ledger: ExpenseLedger;
  server: Server;
  /** Stop accepting requests and release the database */
  close(): Promise<void>;
}

/**
 * Build the application from validated configuration. The database (if any)
 * is connected and the schema initialized; the server is not yet listening.
 */
export async function createApp(config: Config, logger: Logger = getLogger()): Promise<ExpenseApp> {
  let adapter: DatabaseAdapter | null = null;
  let store: ExpenseStore;

  if (config.database.type === 'memory') {
    store = createExpenseStore('memory');
  } else {
    adapter = createDatabaseAdapter(
      {
        type: 'sqlite',
        filename: config.database.filename,
        busyTimeout: config.database.busyTimeout,
        journalMode: config.database.journalMode,
        logging: config.database.logging,
      },
      logger.child({ module: 'SQLiteAdapter' })
    );
    await adapter.connect();
    store = createExpenseStore('database', adapter, logger.child({ module: 'ExpenseStore' }));
  }

  await store.initialize();

  const ledger = new ExpenseLedger(store, {
    ...config.ledger,
    logger: logger.child({ module: 'ExpenseLedger' }),
  });

  const server = createExpenseServer({
    ledger,
    maxBodyBytes: config.server.maxBodyBytes,
    logger: logger.child({ module: 'HttpApi' }),
  });

  const dbAdapter = adapter;

  return {
    adapter,
    store,
    ledger,
    server,
    async close() {
      if (server.listening) {
        await new Promise<void>((resolve, reject) => {
          server.close(error => (error ? reject(error) : resolve()));
        });
      }
      await dbAdapter?.disconnect();
    },
  };
}
