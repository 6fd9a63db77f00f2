export {
  createExpenseHandler,
  createExpenseServer,
  type ExpenseApiOptions,
  type ApiResponse,
} from './server.js';
