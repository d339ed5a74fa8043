/**
 * Date Window Filtering for Payment Matching
 *
 * A payment can only settle a document dated within a configured window
 * around it. The distance is signed: positive when the document is older
 * than the payment.
 *
 * With daysBefore = 10 and daysAfter = 30:
 * - document 15 days before the payment: diff +15, accepted
 * - document 11 days after the payment: diff -11, rejected
 * - document 31 days before the payment: diff +31, rejected
 */

import { MS_PER_DAY } from './constants';
import type { DateWindow } from './types';

/**
 * Whole days from `from` to `to`, by calendar day (UTC).
 *
 * @returns Positive when `to` is later than `from`
 *
 * @example
 * daysBetween(new Date('2024-01-01'), new Date('2024-01-05')) // Returns: 4
 * daysBetween(new Date('2024-01-10'), new Date('2024-01-05')) // Returns: -5
 */
export function daysBetween(from: Date, to: Date): number {
  const utcFrom = Date.UTC(from.getUTCFullYear(), from.getUTCMonth(), from.getUTCDate());
  const utcTo = Date.UTC(to.getUTCFullYear(), to.getUTCMonth(), to.getUTCDate());

  return Math.round((utcTo - utcFrom) / MS_PER_DAY);
}

/**
 * Checks a payment/document date pair against the window.
 * Without a window every pair passes.
 */
export function isWithinDateWindow(
  paymentDate: Date,
  documentDate: Date,
  window: DateWindow | undefined
): boolean {
  if (!window) {
    return true;
  }

  const diff = daysBetween(documentDate, paymentDate);
  return -window.daysBefore <= diff && diff <= window.daysAfter;
}

/**
 * Builds the window only when both bounds are configured.
 */
export function toDateWindow(daysBefore?: number, daysAfter?: number): DateWindow | undefined {
  if (daysBefore === undefined || daysAfter === undefined) {
    return undefined;
  }
  return { daysBefore, daysAfter };
}

export default isWithinDateWindow;
