/**
 * Balance Calculator
 *
 * Equal-split settlement between the two fixed parties. Given what each
 * spent in a period, works out who owes whom half the difference.
 */

import { BALANCE_MESSAGES, BALANCE_TOLERANCE } from './constants.js';
import type { Settlement, SpenderTotals } from './types.js';

export function computeSettlement(totals: SpenderTotals): Settlement {
  const shakib = totals['Shakib'] ?? 0;
  const junit = totals['Junit'] ?? 0;

  const total = shakib + junit;
  if (total === 0) {
    return { kind: 'none' };
  }

  const share = total / 2;
  const diff = shakib - share;

  if (Math.abs(diff) < BALANCE_TOLERANCE) {
    return { kind: 'even' };
  }

  return diff > 0
    ? { kind: 'owes', debtor: 'Junit', creditor: 'Shakib', amount: diff }
    : { kind: 'owes', debtor: 'Shakib', creditor: 'Junit', amount: -diff };
}

export function computeBalanceMessage(totals: SpenderTotals): string {
  return formatSettlement(computeSettlement(totals));
}

export function formatSettlement(settlement: Settlement): string {
  switch (settlement.kind) {
    case 'none':
      return BALANCE_MESSAGES.NO_EXPENSES;
    case 'even':
      return BALANCE_MESSAGES.EVEN;
    case 'owes':
      return `${settlement.debtor} owes ${settlement.creditor} ${formatAmount(settlement.amount)}$.`;
  }
}

/**
 * Two-decimal rendering. `toFixed` rounds exact ties away from zero; those
 * go to the even neighbour instead. A double can only sit exactly halfway
 * between two cents when it is an odd multiple of 1/8.
 */
export function formatAmount(value: number): string {
  const eighths = value * 8;
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    const floor = Math.floor(value * 100);
    const even = floor % 2 === 0 ? floor : floor + 1;
    return (even / 100).toFixed(2);
  }
  return value.toFixed(2);
}
