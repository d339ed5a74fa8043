/**
 * Constants for the Payment Matching Engine
 */

import type { DocumentKind } from '../ledger/types';

// ============================================
// ELIGIBILITY
// ============================================

/**
 * Only simple payments are matched: one leg in the payment account,
 * one leg in the control account.
 */
export const REQUIRED_POSTING_COUNT = 2;

// ============================================
// DATES
// ============================================

export const MS_PER_DAY = 1000 * 60 * 60 * 24;

// ============================================
// LABELS
// ============================================

/**
 * How each document kind is named in report lines.
 */
export const DOCUMENT_LABELS: Readonly<Record<DocumentKind, { singular: string; plural: string }>> = {
  receivable: { singular: 'Invoice', plural: 'invoices' },
  payable: { singular: 'Bill', plural: 'bills' },
};

// ============================================
// CONFIRMATION
// ============================================

export const CONFIRM_QUESTION = 'Match this? [y/N]: ';

/** Anything else, including an empty answer, rejects */
export const AFFIRMATIVE_ANSWER = 'y';

export const SUMMARY_RULE = '-'.repeat(20);

/**
 * Amounts are printed with at least this many decimals.
 */
export const AMOUNT_DECIMALS = 2;
