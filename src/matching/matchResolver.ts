/**
 * Match Resolver
 *
 * First-fit search of the candidate pool for one payment. A document
 * matches when:
 * 1. its total equals the payment amount exactly (no tolerance)
 * 2. its posted date falls inside the date window, if one is configured
 * 3. its posted lot belongs to the control account
 *
 * The first document in pool order that passes all three wins. No attempt
 * is made to prefer a closer date when several documents tie.
 */

import type Decimal from 'decimal.js';
import type { Account, LedgerDocument, Posting } from '../ledger/types';
import { isWithinDateWindow } from './dateWindow';
import type { DateWindow, MatchProposal, PaymentCandidate } from './types';

export function amountsEqual(documentTotal: Decimal, paymentAmount: Decimal): boolean {
  return documentTotal.equals(paymentAmount);
}

/**
 * Documents whose open balance is tracked outside the control account
 * are misconfigured for this run and never match.
 */
export function isTrackedInAccount(document: LedgerDocument, controlAccount: Account): boolean {
  return document.postedLot !== null && document.postedLot.accountGuid === controlAccount.guid;
}

export function isMatch(
  payment: PaymentCandidate,
  document: LedgerDocument,
  controlAccount: Account,
  dateWindow: DateWindow | undefined
): boolean {
  return (
    amountsEqual(document.total, payment.amount) &&
    isWithinDateWindow(payment.date, document.postedDate, dateWindow) &&
    isTrackedInAccount(document, controlAccount)
  );
}

/**
 * Builds the payment side of a proposal from the eligible posting.
 */
export function toPaymentCandidate(
  transaction: PaymentCandidate['transaction'],
  posting: Posting
): PaymentCandidate {
  return {
    transaction,
    posting,
    amount: posting.value.abs(),
    date: transaction.postDate,
  };
}

/**
 * Scans `candidates` in order and returns the first match, if any.
 */
export function resolveMatch(
  payment: PaymentCandidate,
  candidates: readonly LedgerDocument[],
  controlAccount: Account,
  dateWindow: DateWindow | undefined
): MatchProposal | null {
  const document = candidates.find((candidate) =>
    isMatch(payment, candidate, controlAccount, dateWindow)
  );

  return document ? { payment, document } : null;
}

export default resolveMatch;
