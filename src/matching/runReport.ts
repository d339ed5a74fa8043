/**
 * Run Report
 *
 * Text of the lines the tool prints: the initial document count, one audit
 * line per accepted pairing, and the closing summary.
 */

import type Decimal from 'decimal.js';
import type { DocumentKind } from '../ledger/types';
import { formatDay } from '../utils';
import { AMOUNT_DECIMALS, DOCUMENT_LABELS } from './constants';
import type { AcceptedMatch, MatchRunSummary } from './types';

/**
 * At least two decimals; finer amounts keep every digit.
 */
export function formatAmount(amount: Decimal): string {
  return amount.decimalPlaces() < AMOUNT_DECIMALS ? amount.toFixed(AMOUNT_DECIMALS) : amount.toFixed();
}

/**
 * @example
 * formatFoundLine('receivable', 3) // Returns: "Found 3 unpaid invoices."
 */
export function formatFoundLine(kind: DocumentKind, count: number): string {
  return `Found ${count} unpaid ${DOCUMENT_LABELS[kind].plural}.`;
}

/**
 * @example
 * // [1] Matching payment on 2024-01-05 (250.00) to Invoice 000001 (250.00) from 2024-01-01
 */
export function formatMatchLine(match: AcceptedMatch): string {
  const { payment, document } = match;
  return (
    `[${match.sequence}] Matching payment on ${formatDay(payment.date)} (${formatAmount(payment.amount)}) ` +
    `to ${DOCUMENT_LABELS[document.kind].singular} ${document.id} (${formatAmount(document.total)}) ` +
    `from ${formatDay(document.postedDate)}`
  );
}

/**
 * Closing lines, printed before the book is saved (if it is).
 */
export function formatSummaryLines(summary: MatchRunSummary): string[] {
  const count = summary.matches.length;

  if (summary.dryRun) {
    return [`DRY RUN: Found ${count} potential matches. No changes will be saved.`];
  }
  if (summary.changesMade) {
    return [`${count} Matches found.`, 'Saving changes...'];
  }
  return ['No new matches found.'];
}

/**
 * Whether the run leaves changes that must be persisted.
 */
export function needsSave(summary: MatchRunSummary): boolean {
  return !summary.dryRun && summary.changesMade;
}
