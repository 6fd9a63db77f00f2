export {
  type ExpenseStore,
  type ExpenseStoreAdapter,
  DatabaseExpenseStore,
  InMemoryExpenseStore,
  compareExpenses,
  createExpenseStore,
} from './expense-store.js';
