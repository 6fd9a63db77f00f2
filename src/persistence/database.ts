import type { Logger } from 'pino';
import { SQLiteDatabaseAdapter, type SQLiteConfig } from './sqlite-adapter.js';

// ============================================================================
// Database Abstraction Layer
// ============================================================================

/**
 * Database connection configuration
 */
export interface DatabaseConfig {
  /** Database type */
  type: 'sqlite';
  /** Connection string (file path for sqlite) */
  connectionString?: string;
  /** Log every query with its duration at debug level */
  logging?: boolean;
}

/**
 * Query result
 */
export interface QueryResult<T = Record<string, unknown>> {
  rows: T[];
  rowCount: number;
  duration: number;
}

/**
 * Transaction interface
 */
export interface Transaction {
  /** Execute a query within this transaction */
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
  /** Commit the transaction */
  commit(): Promise<void>;
  /** Rollback the transaction */
  rollback(): Promise<void>;
}

/**
 * Database adapter interface
 */
export interface DatabaseAdapter {
  /** Connect to the database */
  connect(): Promise<void>;
  /** Disconnect from the database */
  disconnect(): Promise<void>;
  /** Execute a single parameterized statement */
  query<T = Record<string, unknown>>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;
  /** Execute one or more statements without parameters (schema setup) */
  execute(sql: string): Promise<void>;
  /** Begin a transaction */
  beginTransaction(): Promise<Transaction>;
  /** Check if connected */
  isConnected(): boolean;
  /** Get connection stats */
  getStats(): { connections: number; queries: number; errors: number };
}

/**
 * Build an adapter for the configured backend. The adapter is returned
 * unconnected.
 */
export function createDatabaseAdapter(
  config: SQLiteConfig,
  logger?: Logger
): DatabaseAdapter {
  switch (config.type) {
    case 'sqlite':
      return new SQLiteDatabaseAdapter(config, logger);
    default:
      throw new Error(`Unsupported database type: ${String(config.type)}`);
  }
}
