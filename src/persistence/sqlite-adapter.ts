import Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type { DatabaseAdapter, DatabaseConfig, QueryResult, Transaction } from './database.js';
import { getLogger } from '../observability/logger.js';

// ============================================================================
// SQLite Configuration
// ============================================================================

export interface SQLiteConfig extends DatabaseConfig {
  /** Path to SQLite file (use ":memory:" for in-memory) */
  filename?: string;
  /** Milliseconds to wait for lock */
  busyTimeout?: number;
  /** Journal mode */
  journalMode?: 'wal' | 'delete' | 'truncate' | 'memory' | 'off';
  /** Synchronous setting */
  synchronous?: 'off' | 'normal' | 'full' | 'extra';
  /** Enable foreign keys */
  foreignKeys?: boolean;
  /** Enable read-only mode */
  readonly?: boolean;
}

type StatementCache = Map<string, Database.Statement<unknown[]>>;

function runStatement<T>(
  db: Database.Database,
  cache: StatementCache,
  sql: string,
  params: unknown[]
): { rows: T[]; rowCount: number } {
  let stmt = cache.get(sql);
  if (!stmt) {
    stmt = db.prepare<unknown[]>(sql);
    cache.set(sql, stmt);
  }

  // `reader` is true for SELECT and for INSERT ... RETURNING
  if (stmt.reader) {
    const rows = stmt.all(...params) as T[];
    return { rows, rowCount: rows.length };
  }

  const result = stmt.run(...params);
  return { rows: [], rowCount: result.changes };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// SQLite Transaction
// ============================================================================

class SQLiteTransaction implements Transaction {
  private committed = false;
  private rolledBack = false;

  constructor(
    private readonly db: Database.Database,
    private readonly statementCache: StatementCache
  ) {
    this.db.exec('BEGIN IMMEDIATE');
  }

  async query<T>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
    if (this.committed || this.rolledBack) {
      throw new Error('Transaction already completed');
    }

    const start = Date.now();

    try {
      const result = runStatement<T>(this.db, this.statementCache, sql, params);
      return { ...result, duration: Date.now() - start };
    } catch (error) {
      throw new Error(`SQLite query failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async commit(): Promise<void> {
    if (this.committed || this.rolledBack) {
      throw new Error('Transaction already completed');
    }
    this.db.exec('COMMIT');
    this.committed = true;
  }

  async rollback(): Promise<void> {
    if (this.committed || this.rolledBack) {
      return;
    }
    this.db.exec('ROLLBACK');
    this.rolledBack = true;
  }
}

// ============================================================================
// SQLite Database Adapter
// ============================================================================

interface SQLiteInternalConfig {
  filename: string;
  busyTimeout: number;
  journalMode: 'wal' | 'delete' | 'truncate' | 'memory' | 'off';
  synchronous: 'off' | 'normal' | 'full' | 'extra';
  foreignKeys: boolean;
  readonly: boolean;
  logging: boolean;
}

export class SQLiteDatabaseAdapter implements DatabaseAdapter {
  private db: Database.Database | null = null;
  private readonly config: SQLiteInternalConfig;
  private readonly statementCache: StatementCache = new Map();
  private readonly logger: Logger;
  private queryCount = 0;
  private errorCount = 0;

  constructor(config: SQLiteConfig, logger?: Logger) {
    this.config = {
      filename: config.filename ?? config.connectionString ?? ':memory:',
      busyTimeout: config.busyTimeout ?? 5000,
      journalMode: config.journalMode ?? 'wal',
      synchronous: config.synchronous ?? 'normal',
      foreignKeys: config.foreignKeys ?? true,
      readonly: config.readonly ?? false,
      logging: config.logging ?? false,
    };
    this.logger = logger ?? getLogger().child({ module: 'SQLiteAdapter' });
  }

  async connect(): Promise<void> {
    if (this.db) {
      return;
    }

    try {
      this.db = new Database(this.config.filename, {
        readonly: this.config.readonly,
        fileMustExist: false,
      });

      this.db.pragma(`busy_timeout = ${this.config.busyTimeout}`);
      this.db.pragma(`journal_mode = ${this.config.journalMode}`);
      this.db.pragma(`synchronous = ${this.config.synchronous}`);
      this.db.pragma(`foreign_keys = ${this.config.foreignKeys ? 'ON' : 'OFF'}`);

      this.logger.info({ filename: this.config.filename }, 'SQLite database connected');
    } catch (error) {
      this.errorCount++;
      const message = errorMessage(error);
      this.logger.error({ error: message }, 'Failed to connect to SQLite database');
      throw new Error(`SQLite connection failed: ${message}`, { cause: error });
    }
  }

  async disconnect(): Promise<void> {
    if (!this.db) {
      return;
    }

    this.statementCache.clear();
    this.db.close();
    this.db = null;

    this.logger.info('SQLite database disconnected');
  }

  async query<T>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
    const db = this.requireConnection();

    this.queryCount++;
    const start = Date.now();

    try {
      const result = runStatement<T>(db, this.statementCache, sql, params);
      const duration = Date.now() - start;
      if (this.config.logging) {
        this.logger.debug({ sql, rowCount: result.rowCount, duration }, 'SQLite query');
      }
      return { ...result, duration };
    } catch (error) {
      this.errorCount++;
      const message = errorMessage(error);
      this.logger.error({ sql, error: message }, 'SQLite query failed');
      throw new Error(`SQLite query failed: ${message}`, { cause: error });
    }
  }

  async execute(sql: string): Promise<void> {
    const db = this.requireConnection();

    try {
      db.exec(sql);
    } catch (error) {
      this.errorCount++;
      throw new Error(`SQLite execute failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async beginTransaction(): Promise<Transaction> {
    return new SQLiteTransaction(this.requireConnection(), this.statementCache);
  }

  isConnected(): boolean {
    return this.db !== null && this.db.open;
  }

  getStats(): { connections: number; queries: number; errors: number } {
    return {
      connections: this.db ? 1 : 0,
      queries: this.queryCount,
      errors: this.errorCount,
    };
  }

  private requireConnection(): Database.Database {
    if (!this.db) {
      throw new Error('Database not connected');
    }
    return this.db;
  }
}
