/**
 * Expenses Module
 *
 * Two-party shared expense tracking: storage with period filters, the
 * equal-split balance rule, and the ledger service the HTTP layer calls.
 */

// Types
export type {
  Spender,
  Expense,
  NewExpense,
  DateParts,
  ExpenseFilter,
  SpenderTotals,
  Settlement,
  AmountPolicy,
  PeriodSummary,
  PeriodView,
  MonthChoice,
  ExpenseOptions,
} from './types.js';

// Constants
export {
  SPENDERS,
  DEFAULT_SHOP_CHOICES,
  MONTH_CHOICES,
  BALANCE_MESSAGES,
  BALANCE_TOLERANCE,
  LEDGER_DEFAULTS,
  yearChoices,
} from './constants.js';

// Errors
export {
  ExpenseError,
  InvalidDateError,
  InvalidAmountError,
  InvalidInputError,
  StorageError,
  isExpenseError,
  isStorageError,
} from './errors.js';

// Dates
export { parseIsoDate, formatIsoDate, normalizeIsoDate, matchesFilter } from './dates.js';

// Balance
export {
  computeSettlement,
  computeBalanceMessage,
  formatSettlement,
  formatAmount,
} from './balance.js';

// Input
export {
  ExpenseInputSchema,
  parseExpenseInput,
  parseAmount,
  parsePeriodFilter,
  type ExpenseInput,
} from './input.js';

// Stores
export {
  type ExpenseStore,
  type ExpenseStoreAdapter,
  DatabaseExpenseStore,
  InMemoryExpenseStore,
  compareExpenses,
  createExpenseStore,
} from './stores/index.js';

// Ledger
export { ExpenseLedger, type ExpenseLedgerOptions } from './ledger.js';
