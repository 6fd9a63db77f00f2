/**
 * Calendar date handling for expense records.
 */

import { InvalidDateError } from './errors.js';
import type { DateParts, ExpenseFilter } from './types.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a `YYYY-MM-DD` string into its calendar components. Rejects
 * anything that does not name a real day (e.g. `2023-02-29`).
 */
export function parseIsoDate(input: string): DateParts {
  const match = ISO_DATE.exec(input.trim());
  if (!match) {
    throw new InvalidDateError(input);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const date = new Date(Date.UTC(year, month - 1, day));
  // Date.UTC maps years 0-99 onto 1900-1999
  date.setUTCFullYear(year);

  if (
    year < 1 ||
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    throw new InvalidDateError(input);
  }

  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    day: date.getUTCDate(),
  };
}

export function formatIsoDate({ year, month, day }: DateParts): string {
  return [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0'),
  ].join('-');
}

/** Canonical `YYYY-MM-DD` form of a date string, validating it on the way. */
export function normalizeIsoDate(input: string): string {
  return formatIsoDate(parseIsoDate(input));
}

export function matchesFilter(parts: DateParts, filter: ExpenseFilter): boolean {
  return (
    (filter.year === undefined || parts.year === filter.year) &&
    (filter.month === undefined || parts.month === filter.month) &&
    (filter.day === undefined || parts.day === filter.day)
  );
}
