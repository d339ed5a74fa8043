/**
 * Book repository over a GnuCash SQLite file.
 *
 * Accounts are loaded once; postings and transactions are read on demand.
 * Lot assignments are held in memory until the session saves them, and
 * every read overlays them so later lookups in the run see the change.
 */

import type Database from 'better-sqlite3';
import type {
  Account,
  Book,
  DocumentFilter,
  LedgerDocument,
  LedgerTransaction,
  Lot,
  Posting,
} from '../types';
import { queryDocuments } from './documentQuery';
import {
  toCalendarDay,
  toDecimal,
  type AccountRow,
  type SplitRow,
  type TransactionRow,
} from './rows';

const SPLIT_COLUMNS = 's.guid, s.tx_guid, s.account_guid, s.value_num, s.value_denom, s.lot_guid';

export class SqliteBook implements Book {
  private readonly db: Database.Database;
  private readonly accounts = new Map<string, Account>();
  private readonly children = new Map<string, Account[]>();
  private readonly rootGuid: string;
  private readonly pending = new Map<string, string>();

  constructor(db: Database.Database) {
    this.db = db;

    const book = db.prepare<[], { root_account_guid: string }>('SELECT root_account_guid FROM books LIMIT 1').get();
    if (!book) {
      throw new Error('book table is empty');
    }
    this.rootGuid = book.root_account_guid;

    // GnuCash sorts sibling accounts by code, then name
    const rows = db
      .prepare<[], AccountRow>('SELECT guid, name, parent_guid FROM accounts ORDER BY code, name, guid')
      .all();
    for (const row of rows) {
      const account: Account = { guid: row.guid, name: row.name, parentGuid: row.parent_guid };
      this.accounts.set(account.guid, account);
      if (account.parentGuid !== null) {
        const siblings = this.children.get(account.parentGuid) ?? [];
        siblings.push(account);
        this.children.set(account.parentGuid, siblings);
      }
    }
  }

  getRootAccount(): Account {
    const root = this.accounts.get(this.rootGuid);
    if (!root) {
      throw new Error(`root account ${this.rootGuid} is missing`);
    }
    return root;
  }

  getChildAccounts(account: Account): Account[] {
    return [...(this.children.get(account.guid) ?? [])];
  }

  getAccountPostings(account: Account): Posting[] {
    const rows = this.db
      .prepare<[string], SplitRow>(
        `SELECT ${SPLIT_COLUMNS}
         FROM splits s
         JOIN transactions t ON t.guid = s.tx_guid
         WHERE s.account_guid = ?
         ORDER BY t.post_date, CAST(t.num AS INTEGER), t.num, t.enter_date, t.description, s.guid`
      )
      .all(account.guid);
    return rows.map((row) => this.toPosting(row));
  }

  getTransaction(guid: string): LedgerTransaction | null {
    const row = this.db
      .prepare<[string], TransactionRow>('SELECT guid, description, post_date FROM transactions WHERE guid = ?')
      .get(guid);
    if (!row) {
      return null;
    }
    return {
      guid: row.guid,
      description: row.description ?? '',
      postDate: toCalendarDay(row.post_date),
    };
  }

  getTransactionPostings(transaction: LedgerTransaction): Posting[] {
    const rows = this.db
      .prepare<[string], SplitRow>(`SELECT ${SPLIT_COLUMNS} FROM splits s WHERE s.tx_guid = ? ORDER BY s.rowid`)
      .all(transaction.guid);
    return rows.map((row) => this.toPosting(row));
  }

  findDocuments(filter: DocumentFilter): LedgerDocument[] {
    return queryDocuments(this.db, filter);
  }

  assignToLot(posting: Posting, lot: Lot): void {
    if (posting.accountGuid !== lot.accountGuid) {
      throw new Error(`posting ${posting.guid} and lot ${lot.guid} belong to different accounts`);
    }
    this.pending.set(posting.guid, lot.guid);
    posting.lotGuid = lot.guid;
  }

  /**
   * Assignments made since the last save, keyed by posting guid.
   */
  pendingAssignments(): ReadonlyMap<string, string> {
    return this.pending;
  }

  clearPendingAssignments(): void {
    this.pending.clear();
  }

  private toPosting(row: SplitRow): Posting {
    return {
      guid: row.guid,
      transactionGuid: row.tx_guid,
      accountGuid: row.account_guid,
      value: toDecimal(row.value_num, row.value_denom),
      lotGuid: this.pending.get(row.guid) ?? row.lot_guid,
    };
  }
}

export default SqliteBook;
