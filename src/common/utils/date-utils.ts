import { differenceInMonths, format, isValid, parse } from 'date-fns';
import { InvalidInputException } from '../exceptions/billing.exceptions';

/** Calendar dates travel through the ledger as `YYYY-MM-DD` strings. */
export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const ISO_DATE_FORMAT = 'yyyy-MM-dd';

export function parseIsoDate(value: string): Date {
  const parsed = ISO_DATE_PATTERN.test(value)
    ? parse(value, ISO_DATE_FORMAT, new Date(0))
    : new Date(Number.NaN);
  if (!isValid(parsed)) {
    throw new InvalidInputException([`"${value}" is not a valid YYYY-MM-DD date`]);
  }
  return parsed;
}

export function toIsoDate(date: Date): string {
  return format(date, ISO_DATE_FORMAT);
}

/**
 * Complete calendar months elapsed between two dates. Negative when `to` is
 * before `from`.
 */
export function wholeMonthsBetween(from: string, to: string): number {
  return differenceInMonths(parseIsoDate(to), parseIsoDate(from));
}
