/**
 * Row shapes of the GnuCash SQL backend tables this tool reads,
 * and conversions from their storage encodings.
 */

import Decimal from 'decimal.js';

export interface AccountRow {
  guid: string;
  name: string;
  parent_guid: string | null;
}

export interface TransactionRow {
  guid: string;
  description: string | null;
  post_date: string | null;
}

export interface SplitRow {
  guid: string;
  tx_guid: string;
  account_guid: string;
  value_num: number;
  value_denom: number;
  lot_guid: string | null;
}

export interface QuantityRow {
  quantity_num: number;
  quantity_denom: number;
}

export interface InvoiceRow {
  guid: string;
  id: string;
  date_posted: string | null;
  active: number;
  billing_id: string | null;
  post_lot: string | null;
  lot_account_guid: string | null;
  lot_is_closed: number | null;
  owner_name: string | null;
  total_num: number | null;
  total_denom: number | null;
}

export interface LockRow {
  Hostname: string;
  PID: number;
}

/**
 * GnuCash owner types (gncOwner.h).
 */
export const OWNER_TYPE = {
  CUSTOMER: 2,
  JOB: 3,
  VENDOR: 4,
  EMPLOYEE: 5,
} as const;

/**
 * Builds an exact decimal from a GnuCash rational (num/denom).
 */
export function toDecimal(num: number, denom: number): Decimal {
  if (denom === 0) {
    return new Decimal(0);
  }
  return new Decimal(num).div(denom);
}

const TIMESTAMP = /^(\d{4})-?(\d{2})-?(\d{2})(?:[ T]?(\d{2}):?(\d{2}):?(\d{2}))?/;

/** Time of day GnuCash 2.6.12+ stores for dates without a time */
const NEUTRAL_TIME = '10:59:00';

/**
 * Converts a stored timestamp to the calendar day it names.
 *
 * Accepts both "YYYY-MM-DD HH:MM:SS" (current backend) and
 * "YYYYMMDDHHMMSS" (books written by GnuCash 2.4 and older).
 * Timestamps at neutral time, or without a time, name their UTC date.
 * Any other time is local midnight written as UTC by older releases,
 * so the local date of that instant is taken.
 * Unparseable or missing values map to the epoch.
 */
export function toCalendarDay(timestamp: string | null): Date {
  const match = timestamp ? TIMESTAMP.exec(timestamp) : null;
  if (!match) {
    return new Date(0);
  }

  const [, year, month, day, hours, minutes, seconds] = match;
  if (!hours || `${hours}:${minutes}:${seconds}` === NEUTRAL_TIME) {
    return new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  }

  const instant = new Date(
    Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hours), Number(minutes), Number(seconds))
  );
  return new Date(Date.UTC(instant.getFullYear(), instant.getMonth(), instant.getDate()));
}
