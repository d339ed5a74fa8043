/**
 * Ledger Records
 *
 * Read-only views of the book's accounts, transactions, postings (splits),
 * lots and business documents. Identity is always the GnuCash GUID string;
 * two records describe the same entity when their guids are equal.
 */

import type Decimal from 'decimal.js';

// ============================================
// Records
// ============================================

export interface Account {
  guid: string;
  name: string;
  parentGuid: string | null;
}

export interface LedgerTransaction {
  guid: string;
  description: string;
  /** Calendar day the transaction is posted on (UTC midnight) */
  postDate: Date;
}

/**
 * One leg of a transaction, booked against one account.
 */
export interface Posting {
  guid: string;
  transactionGuid: string;
  accountGuid: string;
  /** Signed value in the transaction currency */
  value: Decimal;
  /** Lot the posting belongs to, null while unassigned */
  lotGuid: string | null;
}

/**
 * Open-balance group: postings of one account tracking an outstanding amount.
 */
export interface Lot {
  guid: string;
  accountGuid: string;
}

/**
 * receivable = customer invoice, payable = vendor bill
 */
export type DocumentKind = 'receivable' | 'payable';

export interface LedgerDocument {
  guid: string;
  kind: DocumentKind;
  /** Document number shown to the user, e.g. "000042" */
  id: string;
  billingId: string | null;
  ownerName: string | null;
  total: Decimal;
  /** Calendar day the document was posted on (UTC midnight) */
  postedDate: Date;
  isPaid: boolean;
  isActive: boolean;
  /** Lot tracking the open balance; null for documents never posted */
  postedLot: Lot | null;
}

export interface DocumentFilter {
  kind: DocumentKind;
  isPaid?: boolean;
  isActive?: boolean;
}

// ============================================
// Collaborator interfaces
// ============================================

/**
 * Repository over an opened book.
 *
 * Reads reflect lot assignments made earlier in the same session,
 * whether or not they have been saved yet.
 */
export interface Book {
  getRootAccount(): Account;
  getChildAccounts(account: Account): Account[];
  /** Postings of the account in ledger order */
  getAccountPostings(account: Account): Posting[];
  getTransaction(guid: string): LedgerTransaction | null;
  getTransactionPostings(transaction: LedgerTransaction): Posting[];
  findDocuments(filter: DocumentFilter): LedgerDocument[];
  /** Puts the posting into the lot; persisted on the next save */
  assignToLot(posting: Posting, lot: Lot): void;
}

/**
 * Exclusive, locked access to a book for the duration of a run.
 */
export interface Session {
  readonly book: Book;
  readonly hasPendingChanges: boolean;
  /** Writes every pending change at once, or nothing */
  save(): void;
  /** Releases the lock; safe to call more than once */
  end(): void;
}

export type SessionFactory = (ledgerPath: string) => Session;
