export { findAccountByPath, lookupByName, ACCOUNT_SEPARATOR } from './accountPath';
export { SqliteSession, openSqliteSession } from './sqlite/session';
export { SqliteBook } from './sqlite/sqliteBook';
export { queryDocuments, buildDocumentQuery } from './sqlite/documentQuery';

export type {
  Account,
  Book,
  DocumentFilter,
  DocumentKind,
  LedgerDocument,
  LedgerTransaction,
  Lot,
  Posting,
  Session,
  SessionFactory,
} from './types';
