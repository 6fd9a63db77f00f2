export {
  ConfigSchema,
  ConfigLoader,
  ConfigValidationError,
  type Config,
  type ServerConfig,
  type StorageConfig,
  type ObservabilityConfig,
  type LedgerConfig,
} from './schema.js';
