/**
 * Reconciliation Service
 *
 * Runs one matching pass over a book:
 * - opening and locking the book
 * - resolving the payment and control accounts
 * - loading the unpaid documents into the candidate pool
 * - running the matching engine
 * - reporting and saving
 *
 * Failures before matching leave the book untouched. The session is ended
 * on every path once it has been opened.
 */

import { findAccountByPath, openSqliteSession } from '../ledger';
import type { DocumentKind, Session, SessionFactory } from '../ledger';
import {
  acceptAll,
  CandidatePool,
  formatFoundLine,
  formatSummaryLines,
  matchPayments,
  needsSave,
  toDateWindow,
  type ConfirmationGate,
} from '../matching';
import type { MatchMode, MatchRunOptions, RunOutcome } from '../types';
import { consoleReportWriter, logger, MatcherError, type ReportWriter } from '../utils';

// ============================================
// Types
// ============================================

export interface ReconciliationDeps {
  openSession: SessionFactory;
  writer: ReportWriter;
  /** Gate used when `confirm` is set; runs without it accept every pairing */
  interactiveGate?: ConfirmationGate;
}

const KIND_BY_MODE: Record<MatchMode, DocumentKind> = {
  ar: 'receivable',
  ap: 'payable',
};

const defaultDeps: ReconciliationDeps = {
  openSession: openSqliteSession,
  writer: consoleReportWriter,
};

// ============================================
// Run
// ============================================

function toOutcome(error: MatcherError): RunOutcome {
  return error.kind === 'configuration'
    ? { status: 'configuration-error', message: error.message }
    : { status: 'session-error', message: error.message };
}

async function runWithSession(
  session: Session,
  options: MatchRunOptions,
  deps: ReconciliationDeps
): Promise<RunOutcome> {
  const { book } = session;
  const { writer } = deps;

  const paymentAccount = findAccountByPath(book, options.paymentAccountPath);
  if (!paymentAccount) {
    throw MatcherError.accountNotFound('payment', options.paymentAccountPath);
  }

  const controlAccount = findAccountByPath(book, options.controlAccountPath);
  if (!controlAccount) {
    throw MatcherError.accountNotFound('control', options.controlAccountPath);
  }

  const kind = KIND_BY_MODE[options.mode];
  const pool = new CandidatePool(book.findDocuments({ kind, isPaid: false }));
  writer.line(formatFoundLine(kind, pool.size));

  const dateWindow = toDateWindow(options.daysBefore, options.daysAfter);
  if (!dateWindow && (options.daysBefore !== undefined || options.daysAfter !== undefined)) {
    logger.warn('Date filtering needs both --days_before and --days_after; matching without a date window');
  }

  let confirm = acceptAll;
  if (options.confirm) {
    if (!deps.interactiveGate) {
      throw MatcherError.invalidOptions('Interactive confirmation is not available in this context');
    }
    confirm = deps.interactiveGate;
  }

  const summary = await matchPayments(
    book,
    pool,
    {
      paymentAccount,
      controlAccount,
      dateWindow,
      dryRun: options.dryRun,
      confirm,
    },
    writer
  );

  logger.info(
    `Evaluated ${summary.transactionsEvaluated} transaction(s): ` +
      `${summary.matches.length} matched, ${summary.rejectedCount} rejected`
  );

  for (const line of formatSummaryLines(summary)) {
    writer.line(line);
  }

  const saved = needsSave(summary);
  if (saved) {
    session.save();
  }

  return {
    status: 'success',
    documentsFound: summary.documentsFound,
    matchCount: summary.matches.length,
    saved,
  };
}

/**
 * Runs a reconciliation and reports the outcome.
 *
 * Configuration and session failures come back as tagged outcomes;
 * anything else is a bug and is rethrown.
 */
export async function runReconciliation(
  options: MatchRunOptions,
  deps: Partial<ReconciliationDeps> = {}
): Promise<RunOutcome> {
  const resolved: ReconciliationDeps = { ...defaultDeps, ...deps };

  let session: Session;
  try {
    session = resolved.openSession(options.ledgerPath);
  } catch (error) {
    if (error instanceof MatcherError) {
      logger.debug(`Run stopped: ${error.message}`);
      return toOutcome(error);
    }
    throw error;
  }

  try {
    const outcome = await runWithSession(session, options, resolved);
    resolved.writer.line('Done.');
    return outcome;
  } catch (error) {
    if (error instanceof MatcherError) {
      logger.debug(`Run stopped: ${error.message}`);
      return toOutcome(error);
    }
    throw error;
  } finally {
    session.end();
  }
}

export const reconciliationService = {
  runReconciliation,
};

export default reconciliationService;
