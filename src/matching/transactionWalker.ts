/**
 * Transaction Walker
 *
 * Visits every transaction touching the payment account once, in the
 * account's ledger order, however many of its postings hit the account.
 */

import type { Account, Book, LedgerTransaction } from '../ledger/types';
import { logger } from '../utils';

/**
 * Yields each distinct transaction of the account.
 *
 * A transaction id is added to `processed` when the consumer resumes the
 * generator, i.e. right after it has finished evaluating that transaction.
 * Ids already in `processed` are skipped.
 */
export function* walkTransactions(
  book: Book,
  paymentAccount: Account,
  processed: Set<string> = new Set()
): Generator<LedgerTransaction, void, undefined> {
  for (const posting of book.getAccountPostings(paymentAccount)) {
    if (processed.has(posting.transactionGuid)) {
      continue;
    }

    const transaction = book.getTransaction(posting.transactionGuid);
    if (!transaction) {
      logger.warn(`Posting ${posting.guid} refers to missing transaction ${posting.transactionGuid}`);
      continue;
    }

    yield transaction;
    processed.add(transaction.guid);
  }
}

export default walkTransactions;
