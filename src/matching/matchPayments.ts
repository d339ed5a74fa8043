/**
 * Payment Matching Engine
 *
 * Walks the payment account and pairs each simple payment with one open
 * document.
 *
 * Flow per transaction:
 * 1. Skip transactions already evaluated
 * 2. Find the unassigned control-account posting (eligibility)
 * 3. First-fit search of the candidate pool (resolver)
 * 4. Ask the confirmation gate
 * 5. Commit, emit the audit line, drop the document from the pool
 *
 * A rejected proposal ends the search for that transaction; the document
 * stays in the pool for later payments.
 */

import type { Book } from '../ledger/types';
import { logger, type ReportWriter } from '../utils';
import { CandidatePool } from './candidatePool';
import { commitMatch } from './commitMatch';
import { findEligiblePosting } from './eligibility';
import { resolveMatch, toPaymentCandidate } from './matchResolver';
import { formatMatchLine } from './runReport';
import { walkTransactions } from './transactionWalker';
import type { AcceptedMatch, MatchEngineOptions, MatchRunSummary } from './types';

export async function matchPayments(
  book: Book,
  pool: CandidatePool,
  options: MatchEngineOptions,
  writer: ReportWriter
): Promise<MatchRunSummary> {
  const processed = new Set<string>();
  const matches: AcceptedMatch[] = [];
  let rejectedCount = 0;

  for (const transaction of walkTransactions(book, options.paymentAccount, processed)) {
    const posting = findEligiblePosting(book, transaction, options.controlAccount);
    if (!posting) {
      continue;
    }

    const payment = toPaymentCandidate(transaction, posting);
    const proposal = resolveMatch(payment, pool.snapshot(), options.controlAccount, options.dateWindow);
    if (!proposal) {
      logger.debug(`No open document for transaction ${transaction.guid}`);
      continue;
    }

    if (!(await options.confirm(proposal))) {
      rejectedCount++;
      logger.info(`Rejected pairing of transaction ${transaction.guid} with ${proposal.document.id}`);
      continue;
    }

    const match = commitMatch(book, pool, proposal, matches.length + 1, options.dryRun);
    matches.push(match);
    writer.line(formatMatchLine(match));
  }

  return {
    documentsFound: pool.seededCount,
    transactionsEvaluated: processed.size,
    matches,
    rejectedCount,
    changesMade: matches.some((match) => match.committed),
    dryRun: options.dryRun,
  };
}

export default matchPayments;
