/**
 * Eligibility Filter
 *
 * A transaction is a reconciliation candidate when it has exactly two
 * postings and one of them sits in the control account without a lot.
 * Anything else is skipped silently; it is not a data error.
 */

import type { Account, Book, LedgerTransaction, Posting } from '../ledger/types';
import { REQUIRED_POSTING_COUNT } from './constants';

/**
 * Returns the unassigned control-account posting of the transaction,
 * or null when the transaction is not eligible.
 */
export function findEligiblePosting(
  book: Book,
  transaction: LedgerTransaction,
  controlAccount: Account
): Posting | null {
  const postings = book.getTransactionPostings(transaction);

  if (postings.length !== REQUIRED_POSTING_COUNT) {
    return null;
  }

  return (
    postings.find((posting) => posting.accountGuid === controlAccount.guid && posting.lotGuid === null) ??
    null
  );
}

export default findEligiblePosting;
