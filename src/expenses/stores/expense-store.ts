/**
 * Expense Store
 *
 * Persistence layer for expense records with interface, database, and in-memory implementations.
 */

import type { Logger } from 'pino';
import type { DatabaseAdapter } from '../../persistence/database.js';
import { getLogger } from '../../observability/logger.js';
import { formatIsoDate, matchesFilter, parseIsoDate } from '../dates.js';
import { StorageError } from '../errors.js';
import type { DateParts, Expense, ExpenseFilter, NewExpense, SpenderTotals } from '../types.js';

// =============================================================================
// Expense Store Interface
// =============================================================================

export interface ExpenseStore {
  initialize(): Promise<void>;

  /** Persist an expense and return its newly assigned id. */
  add(expense: NewExpense): Promise<number>;

  /** Matching expenses, oldest date first; newest id first within a date. */
  list(filter?: ExpenseFilter): Promise<Expense[]>;

  /** Summed amount per spender over the matching expenses. */
  totals(filter?: ExpenseFilter): Promise<SpenderTotals>;
}

export type ExpenseStoreAdapter = Pick<DatabaseAdapter, 'query' | 'execute'>;

/** Expenses sharing a date are listed most recently added first. */
export function compareExpenses(a: Expense, b: Expense): number {
  if (a.date < b.date) return -1;
  if (a.date > b.date) return 1;
  return b.id - a.id;
}

// =============================================================================
// Database Row Types
// =============================================================================

interface ExpenseRow {
  id: number;
  spender: string;
  date: string;
  shop: string;
  amount: number;
}

interface TotalRow {
  spender: string;
  total: number | null;
}

// =============================================================================
// Database Expense Store
// =============================================================================

export class DatabaseExpenseStore implements ExpenseStore {
  private readonly logger: Logger;

  constructor(
    private readonly db: ExpenseStoreAdapter,
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger().child({ module: 'ExpenseStore' });
  }

  async initialize(): Promise<void> {
    try {
      await this.db.execute(`
        CREATE TABLE IF NOT EXISTS expenses (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          spender TEXT NOT NULL,
          date TEXT NOT NULL,
          year INTEGER NOT NULL,
          month INTEGER NOT NULL,
          day INTEGER NOT NULL,
          shop TEXT NOT NULL,
          amount REAL NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_expenses_date ON expenses(date);
        CREATE INDEX IF NOT EXISTS idx_expenses_spender ON expenses(spender);
        CREATE INDEX IF NOT EXISTS idx_expenses_period ON expenses(year, month, day);
      `);
    } catch (error) {
      throw new StorageError('initialize', error);
    }

    this.logger.info('Expense schema ready');
  }

  async add(expense: NewExpense): Promise<number> {
    const parts = parseIsoDate(expense.date);

    let rows: Array<{ id: number }>;
    try {
      ({ rows } = await this.db.query<{ id: number }>(
        `INSERT INTO expenses (spender, date, year, month, day, shop, amount)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         RETURNING id`,
        [
          expense.spender,
          formatIsoDate(parts),
          parts.year,
          parts.month,
          parts.day,
          expense.shop,
          expense.amount,
        ]
      ));
    } catch (error) {
      throw new StorageError('add', error);
    }

    const inserted = rows[0];
    if (!inserted) {
      throw new StorageError('add', new Error('Insert returned no id'));
    }

    this.logger.debug({ id: inserted.id }, 'Expense added');
    return inserted.id;
  }

  async list(filter: ExpenseFilter = {}): Promise<Expense[]> {
    const { where, params } = this.buildWhereClause(filter);

    try {
      const result = await this.db.query<ExpenseRow>(
        `SELECT id, spender, date, shop, amount FROM expenses${where} ORDER BY date ASC, id DESC`,
        params
      );
      return result.rows.map(row => ({
        id: row.id,
        spender: row.spender,
        date: row.date,
        shop: row.shop,
        amount: row.amount,
      }));
    } catch (error) {
      throw new StorageError('list', error);
    }
  }

  async totals(filter: ExpenseFilter = {}): Promise<SpenderTotals> {
    const { where, params } = this.buildWhereClause(filter);

    let rows: TotalRow[];
    try {
      ({ rows } = await this.db.query<TotalRow>(
        `SELECT spender, SUM(amount) AS total FROM expenses${where} GROUP BY spender`,
        params
      ));
    } catch (error) {
      throw new StorageError('totals', error);
    }

    const totals: SpenderTotals = {};
    for (const row of rows) {
      totals[row.spender] = row.total ?? 0;
    }
    return totals;
  }

  private buildWhereClause(filter: ExpenseFilter): { where: string; params: unknown[] } {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.year !== undefined) {
      conditions.push('year = ?');
      params.push(filter.year);
    }
    if (filter.month !== undefined) {
      conditions.push('month = ?');
      params.push(filter.month);
    }
    if (filter.day !== undefined) {
      conditions.push('day = ?');
      params.push(filter.day);
    }

    return {
      where: conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '',
      params,
    };
  }
}

// =============================================================================
// In-Memory Expense Store
// =============================================================================

interface StoredExpense {
  expense: Expense;
  parts: DateParts;
}

export class InMemoryExpenseStore implements ExpenseStore {
  private expenses = new Map<number, StoredExpense>();
  private nextId = 1;

  async initialize(): Promise<void> {
    // No-op for in-memory store
  }

  async add(expense: NewExpense): Promise<number> {
    const parts = parseIsoDate(expense.date);
    const id = this.nextId++;

    this.expenses.set(id, {
      expense: { ...expense, id, date: formatIsoDate(parts) },
      parts,
    });
    return id;
  }

  async list(filter: ExpenseFilter = {}): Promise<Expense[]> {
    return this.matching(filter)
      .map(expense => ({ ...expense }))
      .sort(compareExpenses);
  }

  async totals(filter: ExpenseFilter = {}): Promise<SpenderTotals> {
    const totals: SpenderTotals = {};
    for (const expense of this.matching(filter)) {
      totals[expense.spender] = (totals[expense.spender] ?? 0) + expense.amount;
    }
    return totals;
  }

  private matching(filter: ExpenseFilter): Expense[] {
    return Array.from(this.expenses.values())
      .filter(stored => matchesFilter(stored.parts, filter))
      .map(stored => stored.expense);
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createExpenseStore(type: 'memory'): InMemoryExpenseStore;
export function createExpenseStore(
  type: 'database',
  db: ExpenseStoreAdapter,
  logger?: Logger
): DatabaseExpenseStore;
export function createExpenseStore(
  type: 'memory' | 'database',
  db?: ExpenseStoreAdapter,
  logger?: Logger
): ExpenseStore;
export function createExpenseStore(
  type: 'memory' | 'database',
  db?: ExpenseStoreAdapter,
  logger?: Logger
): ExpenseStore {
  if (type === 'memory') {
    return new InMemoryExpenseStore();
  }
  if (!db) {
    throw new Error('Database adapter required for database store');
  }
  return new DatabaseExpenseStore(db, logger);
}
