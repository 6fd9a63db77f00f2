/**
 * Boundary input parsing: raw form/query values into validated primitives.
 */

import { z } from 'zod';
import { SPENDERS } from './constants.js';
import { InvalidAmountError, InvalidInputError } from './errors.js';
import type { AmountPolicy, ExpenseFilter } from './types.js';

// =============================================================================
// Expense Input
// =============================================================================

export const ExpenseInputSchema = z.object({
  spender: z.enum(SPENDERS),
  date: z.string().min(1, 'Date is required'),
  shop: z.string(),
  amount: z.union([z.string(), z.number()]).optional(),
});

export type ExpenseInput = z.infer<typeof ExpenseInputSchema>;

export function parseExpenseInput(raw: unknown): ExpenseInput {
  const result = ExpenseInputSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidInputError(
      result.error.errors.map(e => ({
        path: e.path.join('.'),
        message: e.message,
      }))
    );
  }
  return result.data;
}

// =============================================================================
// Amounts
// =============================================================================

const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Resolve a submitted amount. A blank amount is 0 under either policy.
 * Under `lenient` anything unparseable is also 0; under `strict` it is
 * rejected, as is a negative value.
 */
export function parseAmount(raw: string | number | undefined, policy: AmountPolicy): number {
  if (raw === undefined) {
    return 0;
  }

  const text = typeof raw === 'number' ? String(raw) : raw.trim();
  if (text === '') {
    return 0;
  }

  const value = typeof raw === 'number' ? raw : DECIMAL_LITERAL.test(text) ? Number(text) : NaN;

  if (!Number.isFinite(value)) {
    if (policy === 'strict') {
      throw new InvalidAmountError(text);
    }
    return 0;
  }

  if (value < 0 && policy === 'strict') {
    throw new InvalidAmountError(text, 'negative');
  }

  return value;
}

// =============================================================================
// Period Filters
// =============================================================================

const DIGITS = /^\d+$/;

function component(raw: string | null | undefined): number | undefined {
  const text = raw?.trim() ?? '';
  return DIGITS.test(text) ? Number(text) : undefined;
}

/**
 * Build a filter from query parameters. Components that are not plain
 * digits are treated as absent rather than rejected.
 */
export function parsePeriodFilter(query: {
  get(name: string): string | null | undefined;
}): ExpenseFilter {
  const filter: ExpenseFilter = {};
  const year = component(query.get('year'));
  const month = component(query.get('month'));
  const day = component(query.get('day'));

  if (year !== undefined) filter.year = year;
  if (month !== undefined) filter.month = month;
  if (day !== undefined) filter.day = day;

  return filter;
}
