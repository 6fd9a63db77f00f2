/**
 * Expense Types
 *
 * Records, filters and aggregates shared by the stores, the balance rule
 * and the ledger service.
 */

import type { SPENDERS } from './constants.js';

// =============================================================================
// Records
// =============================================================================

export type Spender = (typeof SPENDERS)[number];

/**
 * A persisted expense. `date` is an ISO calendar date (`YYYY-MM-DD`).
 */
export interface Expense {
  id: number;
  spender: string;
  date: string;
  shop: string;
  amount: number;
}

/** An expense before the store has assigned its id. */
export type NewExpense = Omit<Expense, 'id'>;

/**
 * Calendar components of an expense date. `month` is 1-12, `day` 1-31.
 */
export interface DateParts {
  year: number;
  month: number;
  day: number;
}

// =============================================================================
// Queries
// =============================================================================

/**
 * Period filter. Each supplied component must equal the matching component
 * of the expense date; omitted components match anything.
 */
export type ExpenseFilter = Partial<DateParts>;

/** Spender name to summed amount. Spenders without expenses are absent. */
export type SpenderTotals = Record<string, number>;

// =============================================================================
// Settlement
// =============================================================================

export type Settlement =
  | { kind: 'none' }
  | { kind: 'even' }
  | { kind: 'owes'; debtor: Spender; creditor: Spender; amount: number };

// =============================================================================
// Ledger
// =============================================================================

export type AmountPolicy = 'lenient' | 'strict';

export interface PeriodSummary {
  filter: ExpenseFilter;
  expenses: Expense[];
  totals: SpenderTotals;
  settlement: Settlement;
  balanceMessage: string;
}

export interface PeriodView extends PeriodSummary {
  showResults: boolean;
}

export interface MonthChoice {
  value: number;
  label: string;
}

export interface ExpenseOptions {
  spenders: readonly Spender[];
  shops: readonly string[];
  months: readonly MonthChoice[];
  years: number[];
}
