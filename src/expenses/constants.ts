/**
 * Expense Constants
 */

import type { MonthChoice } from './types.js';

export const SPENDERS = ['Shakib', 'Junit'] as const;

export const DEFAULT_SHOP_CHOICES: readonly string[] = [
  'Mizan',
  'Newon',
  'Madina',
  'Beau-Soir',
  'Costco',
  'Restaurents',
  'Walmart',
  'Amazon',
];

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

export const MONTH_CHOICES: readonly MonthChoice[] = MONTH_NAMES.map((label, i) => ({
  value: i + 1,
  label,
}));

export const BALANCE_MESSAGES = {
  NO_EXPENSES: 'No expenses recorded for this period.',
  EVEN: 'Both Shakib and Junit have spent equally. No one owes anything.',
  SELECT_MONTH: 'Please select a month to see expenses.',
} as const;

/** Below this the two shares count as equal. */
export const BALANCE_TOLERANCE = 1e-6;

export const LEDGER_DEFAULTS = {
  amountPolicy: 'lenient',
  requireMonthForView: true,
  yearsBefore: 2,
  yearsAfter: 2,
} as const;

/**
 * Years offered in the period selector, from `before` years ago through
 * `after` years ahead of `now`.
 */
export function yearChoices(now: Date, before: number, after: number): number[] {
  const current = now.getFullYear();
  const years: number[] = [];
  for (let year = current - before; year <= current + after; year++) {
    years.push(year);
  }
  return years;
}
