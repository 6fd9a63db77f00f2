/**
 * Expense Ledger
 *
 * Boundary-facing service: turns raw submissions into stored expenses and
 * assembles what a period screen shows (entries, totals, settlement).
 */

import type { Logger } from 'pino';
import { getLogger } from '../observability/logger.js';
import { computeSettlement, formatSettlement } from './balance.js';
import {
  BALANCE_MESSAGES,
  DEFAULT_SHOP_CHOICES,
  LEDGER_DEFAULTS,
  MONTH_CHOICES,
  SPENDERS,
  yearChoices,
} from './constants.js';
import { normalizeIsoDate } from './dates.js';
import { parseAmount, parseExpenseInput } from './input.js';
import type { ExpenseStore } from './stores/expense-store.js';
import type {
  AmountPolicy,
  Expense,
  ExpenseFilter,
  ExpenseOptions,
  PeriodSummary,
  PeriodView,
} from './types.js';

export interface ExpenseLedgerOptions {
  amountPolicy?: AmountPolicy;
  /** Withhold results from `view` until a month is chosen */
  requireMonthForView?: boolean;
  yearsBefore?: number;
  yearsAfter?: number;
  shops?: readonly string[];
  /** Clock for the year choices */
  now?: () => Date;
  logger?: Logger;
}

export class ExpenseLedger {
  private readonly amountPolicy: AmountPolicy;
  private readonly requireMonthForView: boolean;
  private readonly yearsBefore: number;
  private readonly yearsAfter: number;
  private readonly shops: readonly string[];
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(
    private readonly store: ExpenseStore,
    options: ExpenseLedgerOptions = {}
  ) {
    this.amountPolicy = options.amountPolicy ?? LEDGER_DEFAULTS.amountPolicy;
    this.requireMonthForView = options.requireMonthForView ?? LEDGER_DEFAULTS.requireMonthForView;
    this.yearsBefore = options.yearsBefore ?? LEDGER_DEFAULTS.yearsBefore;
    this.yearsAfter = options.yearsAfter ?? LEDGER_DEFAULTS.yearsAfter;
    this.shops = options.shops ?? DEFAULT_SHOP_CHOICES;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? getLogger().child({ module: 'ExpenseLedger' });
  }

  /**
   * Validate a raw submission and store it.
   *
   * @throws InvalidInputError, InvalidDateError or InvalidAmountError before
   *   anything is written; StorageError if the write fails
   */
  async record(raw: unknown): Promise<Expense> {
    const input = parseExpenseInput(raw);
    const date = normalizeIsoDate(input.date);
    const amount = parseAmount(input.amount, this.amountPolicy);

    const expense = { spender: input.spender, date, shop: input.shop, amount };
    const id = await this.store.add(expense);

    this.logger.info({ id, spender: expense.spender, date }, 'Expense recorded');
    return { id, ...expense };
  }

  async summarize(filter: ExpenseFilter = {}): Promise<PeriodSummary> {
    const [expenses, totals] = await Promise.all([
      this.store.list(filter),
      this.store.totals(filter),
    ]);
    const settlement = computeSettlement(totals);

    return {
      filter,
      expenses,
      totals,
      settlement,
      balanceMessage: formatSettlement(settlement),
    };
  }

  async view(filter: ExpenseFilter = {}): Promise<PeriodView> {
    if (this.requireMonthForView && filter.month === undefined) {
      return {
        filter,
        expenses: [],
        totals: {},
        settlement: { kind: 'none' },
        balanceMessage: BALANCE_MESSAGES.SELECT_MONTH,
        showResults: false,
      };
    }

    return { ...(await this.summarize(filter)), showResults: true };
  }

  options(): ExpenseOptions {
    return {
      spenders: SPENDERS,
      shops: this.shops,
      months: MONTH_CHOICES,
      years: yearChoices(this.now(), this.yearsBefore, this.yearsAfter),
    };
  }
}
