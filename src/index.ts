// Configuration
export {
  ConfigSchema,
  ConfigLoader,
  ConfigValidationError,
  type Config,
  type ServerConfig,
  type StorageConfig,
  type ObservabilityConfig,
  type LedgerConfig,
} from './config/index.js';

// Observability
export {
  createLogger,
  getLogger,
  initLogger,
  type LoggerConfig,
  type LogLevel,
} from './observability/index.js';

// Persistence
export {
  createDatabaseAdapter,
  SQLiteDatabaseAdapter,
  type DatabaseConfig,
  type DatabaseAdapter,
  type QueryResult,
  type Transaction,
  type SQLiteConfig,
} from './persistence/index.js';

// Expenses
export * from './expenses/index.js';

// HTTP
export {
  createExpenseHandler,
  createExpenseServer,
  type ExpenseApiOptions,
  type ApiResponse,
} from './http/index.js';

// Application
export { createApp, type ExpenseApp } from './app.js';
