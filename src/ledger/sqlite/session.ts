/**
 * Session over a GnuCash SQLite book
 *
 * Opening takes the book's lock (a row in `gnclock`) so GnuCash itself and
 * other tools see the file as in use. Saving writes all pending lot
 * assignments in a single SQLite transaction and refreshes the closed flag
 * of every lot it touched. Ending releases the lock and the file handle.
 */

import Database from 'better-sqlite3';
import Decimal from 'decimal.js';
import { closeSync, existsSync, openSync, readSync } from 'fs';
import { hostname } from 'os';
import type { Session } from '../types';
import { logger, MatcherError } from '../../utils';
import { SqliteBook } from './sqliteBook';
import { toDecimal, type LockRow, type QuantityRow } from './rows';

const SQLITE_HEADER = 'SQLite format 3\u0000';
const REQUIRED_TABLES = ['books', 'accounts', 'transactions', 'splits', 'lots', 'invoices', 'gnclock'];

function hasSqliteHeader(path: string): boolean {
  const header = Buffer.alloc(SQLITE_HEADER.length);
  const fd = openSync(path, 'r');
  try {
    const read = readSync(fd, header, 0, header.length, 0);
    return read === header.length && header.toString('latin1') === SQLITE_HEADER;
  } finally {
    closeSync(fd);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SqliteSession implements Session {
  public readonly book: SqliteBook;
  private readonly db: Database.Database;
  private readonly lockHost: string;
  private readonly lockPid: number;
  private ended = false;

  private constructor(db: Database.Database, book: SqliteBook, lockHost: string, lockPid: number) {
    this.db = db;
    this.book = book;
    this.lockHost = lockHost;
    this.lockPid = lockPid;
  }

  /**
   * Opens and locks a book.
   *
   * @throws MatcherError (session) when the file is missing, is not a
   *   GnuCash SQLite book, or is locked by someone else
   */
  static open(ledgerPath: string): SqliteSession {
    if (!existsSync(ledgerPath)) {
      throw MatcherError.sessionOpen(ledgerPath, 'file does not exist');
    }

    let db: Database.Database;
    try {
      if (!hasSqliteHeader(ledgerPath)) {
        throw new Error('not an SQLite book (only the SQLite backend is supported)');
      }
      db = new Database(ledgerPath, { fileMustExist: true });
    } catch (error) {
      throw MatcherError.sessionOpen(ledgerPath, errorMessage(error));
    }

    try {
      SqliteSession.checkSchema(db);
      const book = new SqliteBook(db);

      const lock = db.prepare<[], LockRow>('SELECT Hostname, PID FROM gnclock LIMIT 1').get();
      if (lock) {
        throw MatcherError.sessionLocked(ledgerPath, `${lock.Hostname} (pid ${lock.PID})`);
      }

      const lockHost = hostname();
      db.prepare<[string, number]>('INSERT INTO gnclock (Hostname, PID) VALUES (?, ?)').run(
        lockHost,
        process.pid
      );
      logger.debug(`Locked ${ledgerPath} as ${lockHost}:${process.pid}`);

      return new SqliteSession(db, book, lockHost, process.pid);
    } catch (error) {
      db.close();
      if (error instanceof MatcherError) {
        throw error;
      }
      throw MatcherError.sessionOpen(ledgerPath, errorMessage(error));
    }
  }

  private static checkSchema(db: Database.Database): void {
    const present = new Set(
      db
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table'")
        .all()
        .map((row) => row.name)
    );
    const missing = REQUIRED_TABLES.filter((table) => !present.has(table));
    if (missing.length > 0) {
      throw new Error(`not a GnuCash book (missing tables: ${missing.join(', ')})`);
    }
  }

  get hasPendingChanges(): boolean {
    return this.book.pendingAssignments().size > 0;
  }

  save(): void {
    if (this.ended) {
      throw MatcherError.sessionClosed();
    }

    const assignments = [...this.book.pendingAssignments()];
    if (assignments.length === 0) {
      return;
    }

    const assign = this.db.prepare<[string, string]>('UPDATE splits SET lot_guid = ? WHERE guid = ?');
    const lotQuantities = this.db.prepare<[string], QuantityRow>(
      'SELECT quantity_num, quantity_denom FROM splits WHERE lot_guid = ?'
    );
    const markClosed = this.db.prepare<[number, string]>('UPDATE lots SET is_closed = ? WHERE guid = ?');

    const write = this.db.transaction((pairs: Array<[string, string]>) => {
      for (const [postingGuid, lotGuid] of pairs) {
        const result = assign.run(lotGuid, postingGuid);
        if (result.changes !== 1) {
          throw new Error(`split ${postingGuid} no longer exists`);
        }
      }

      for (const lotGuid of new Set(pairs.map(([, lot]) => lot))) {
        const balance = lotQuantities
          .all(lotGuid)
          .reduce((sum, row) => sum.plus(toDecimal(row.quantity_num, row.quantity_denom)), new Decimal(0));
        markClosed.run(balance.isZero() ? 1 : 0, lotGuid);
      }
    });

    try {
      write(assignments);
    } catch (error) {
      throw MatcherError.sessionSave(errorMessage(error));
    }

    this.book.clearPendingAssignments();
    logger.info(`Saved ${assignments.length} lot assignment(s)`);
  }

  end(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;

    try {
      this.db
        .prepare<[string, number]>('DELETE FROM gnclock WHERE Hostname = ? AND PID = ?')
        .run(this.lockHost, this.lockPid);
    } finally {
      this.db.close();
    }
  }
}

export const openSqliteSession = (ledgerPath: string): Session => SqliteSession.open(ledgerPath);

export default SqliteSession;
