/**
 * Type Definitions for the Payment Matching Engine
 *
 * The engine pairs the control-account leg of a payment transaction with
 * exactly one open document. It reads the book through the `Book`
 * interface and never assumes it owns the records it is handed.
 */

import type Decimal from 'decimal.js';
import type { Account, LedgerDocument, LedgerTransaction, Posting } from '../ledger/types';

// ============================================
// INPUT TYPES
// ============================================

/**
 * Allowed distance between payment and document dates.
 * Compared against (payment date - document date) in days.
 */
export interface DateWindow {
  /** Document may be dated up to this many days after the payment */
  daysBefore: number;
  /** Document may be dated up to this many days before the payment */
  daysAfter: number;
}

/**
 * The control-account posting of an eligible transaction.
 */
export interface PaymentCandidate {
  transaction: LedgerTransaction;
  posting: Posting;
  /** Absolute value of the posting */
  amount: Decimal;
  date: Date;
}

/**
 * A payment paired with the first document that satisfies the criteria,
 * before confirmation.
 */
export interface MatchProposal {
  payment: PaymentCandidate;
  document: LedgerDocument;
}

/**
 * Decides whether a proposal gets committed.
 */
export type ConfirmationGate = (proposal: MatchProposal) => Promise<boolean>;

export interface MatchEngineOptions {
  paymentAccount: Account;
  controlAccount: Account;
  /** Date filtering is off when undefined */
  dateWindow?: DateWindow;
  dryRun: boolean;
  confirm: ConfirmationGate;
}

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * One accepted pairing, in the order it was accepted.
 */
export interface AcceptedMatch extends MatchProposal {
  /** 1-based position in the run */
  sequence: number;
  /** False in dry-run mode: the posting was left unassigned */
  committed: boolean;
}

export interface MatchRunSummary {
  documentsFound: number;
  transactionsEvaluated: number;
  matches: AcceptedMatch[];
  rejectedCount: number;
  changesMade: boolean;
  dryRun: boolean;
}
