// Calendar-month windows (UTC)

import { DataError } from '../types/errors.js';

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

export interface MonthWindow {
  /** Inclusive */
  start: Date;
  /** Exclusive: first instant of the following month */
  end: Date;
}

export function assertPeriod(year: number, month: number): void {
  if (!Number.isInteger(year) || year < 2000 || year > 2099) {
    throw new DataError(`Invalid year ${year}: must be an integer between 2000 and 2099`);
  }
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new DataError(`Invalid month ${month}: must be an integer from 1 to 12`);
  }
}

/**
 * Half-open window covering the whole calendar month. Date.UTC rolls month 12
 * over into January of the next year, so variable month lengths and leap years
 * need no special casing.
 */
export function monthWindow(year: number, month: number): MonthWindow {
  assertPeriod(year, month);
  return {
    start: new Date(Date.UTC(year, month - 1, 1)),
    end: new Date(Date.UTC(year, month, 1)),
  };
}

export function monthName(month: number): string {
  const name = MONTH_NAMES[month - 1];
  if (!name) throw new DataError(`Invalid month ${month}: must be an integer from 1 to 12`);
  return name;
}
