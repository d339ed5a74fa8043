/**
 * Commit Step
 *
 * Applies an accepted pairing. The posting joins the document's lot unless
 * this is a dry run; either way the document leaves the pool so it cannot
 * be matched twice in the run.
 */

import type { Book } from '../ledger/types';
import type { CandidatePool } from './candidatePool';
import type { AcceptedMatch, MatchProposal } from './types';

export function commitMatch(
  book: Book,
  pool: CandidatePool,
  proposal: MatchProposal,
  sequence: number,
  dryRun: boolean
): AcceptedMatch {
  const { payment, document } = proposal;
  let committed = false;

  if (!dryRun && document.postedLot) {
    book.assignToLot(payment.posting, document.postedLot);
    committed = true;
  }

  pool.remove(document);

  return { ...proposal, sequence, committed };
}

export default commitMatch;
