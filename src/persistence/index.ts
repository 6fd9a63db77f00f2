// Database
export {
  createDatabaseAdapter,
  type DatabaseConfig,
  type DatabaseAdapter,
  type QueryResult,
  type Transaction,
} from './database.js';

// SQLite Adapter
export {
  SQLiteDatabaseAdapter,
  type SQLiteConfig,
} from './sqlite-adapter.js';
