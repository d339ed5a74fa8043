/**
 * Payment Matching Engine
 *
 * Pairs payments in a cash account with open invoices or bills by exact
 * amount and an optional date window.
 *
 * Usage:
 * ```typescript
 * import { CandidatePool, matchPayments, acceptAll } from './matching';
 *
 * const pool = new CandidatePool(book.findDocuments({ kind: 'receivable', isPaid: false }));
 * const summary = await matchPayments(book, pool, {
 *   paymentAccount, controlAccount, kind: 'receivable', dryRun: true, confirm: acceptAll,
 * }, consoleReportWriter);
 * ```
 */

// Main function
export { matchPayments } from './matchPayments';

// Pipeline stages
export { CandidatePool } from './candidatePool';
export { walkTransactions } from './transactionWalker';
export { findEligiblePosting } from './eligibility';
export {
  resolveMatch,
  isMatch,
  amountsEqual,
  isTrackedInAccount,
  toPaymentCandidate,
} from './matchResolver';
export { daysBetween, isWithinDateWindow, toDateWindow } from './dateWindow';
export {
  acceptAll,
  createInteractiveGate,
  createTerminalPrompt,
  describeProposal,
  isAffirmative,
} from './confirmationGate';
export { commitMatch } from './commitMatch';
export {
  formatAmount,
  formatFoundLine,
  formatMatchLine,
  formatSummaryLines,
  needsSave,
} from './runReport';

// Constants
export {
  REQUIRED_POSTING_COUNT,
  DOCUMENT_LABELS,
  CONFIRM_QUESTION,
  AFFIRMATIVE_ANSWER,
} from './constants';

// Types
export type {
  AcceptedMatch,
  ConfirmationGate,
  DateWindow,
  MatchEngineOptions,
  MatchProposal,
  MatchRunSummary,
  PaymentCandidate,
} from './types';
export type { Ask } from './confirmationGate';
