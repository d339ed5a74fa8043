/**
 * Document Query for the GnuCash SQL backend
 *
 * Lists customer invoices or vendor bills, optionally filtered by paid
 * and active status. Mirrors the book's own invoice query:
 * - kind comes from the owner type; job owners inherit their owner's type
 * - credit notes and employee vouchers are never returned
 * - a document is paid once its posted lot is closed
 * - the total is the value that opened the posted lot
 */

import type Database from 'better-sqlite3';
import type { DocumentFilter, DocumentKind, LedgerDocument } from '../types';
import { OWNER_TYPE, toCalendarDay, toDecimal, type InvoiceRow } from './rows';

const OWNER_TYPE_BY_KIND: Record<DocumentKind, number> = {
  receivable: OWNER_TYPE.CUSTOMER,
  payable: OWNER_TYPE.VENDOR,
};

const BASE_QUERY = `
  SELECT
    i.guid,
    i.id,
    i.date_posted,
    i.active,
    i.billing_id,
    i.post_lot,
    l.account_guid AS lot_account_guid,
    l.is_closed AS lot_is_closed,
    COALESCE(c.name, v.name, j.name) AS owner_name,
    opening.value_num AS total_num,
    opening.value_denom AS total_denom
  FROM invoices i
  LEFT JOIN lots l ON l.guid = i.post_lot
  LEFT JOIN jobs j ON i.owner_type = ${OWNER_TYPE.JOB} AND j.guid = i.owner_guid
  LEFT JOIN customers c ON i.owner_type = ${OWNER_TYPE.CUSTOMER} AND c.guid = i.owner_guid
  LEFT JOIN vendors v ON i.owner_type = ${OWNER_TYPE.VENDOR} AND v.guid = i.owner_guid
  LEFT JOIN splits opening ON opening.guid = (
    SELECT s.guid FROM splits s
    WHERE s.tx_guid = i.post_txn AND s.account_guid = i.post_acc AND s.lot_guid = i.post_lot
    ORDER BY s.guid
    LIMIT 1
  )
  WHERE CASE WHEN i.owner_type = ${OWNER_TYPE.JOB} THEN j.owner_type ELSE i.owner_type END = @ownerType
    AND NOT EXISTS (
      SELECT 1 FROM slots cn
      WHERE cn.obj_guid = i.guid AND cn.name = 'credit-note' AND cn.int64_val = 1
    )`;

interface QueryParams {
  ownerType: number;
  active?: number;
}

/**
 * Builds the SQL for a filter. Exposed for tests.
 */
export function buildDocumentQuery(filter: DocumentFilter): { sql: string; params: QueryParams } {
  const clauses: string[] = [BASE_QUERY];
  const params: QueryParams = { ownerType: OWNER_TYPE_BY_KIND[filter.kind] };

  if (filter.isPaid === true) {
    clauses.push('AND l.is_closed = 1');
  } else if (filter.isPaid === false) {
    clauses.push('AND (l.guid IS NULL OR l.is_closed = 0)');
  }

  if (filter.isActive !== undefined) {
    clauses.push('AND i.active = @active');
    params.active = filter.isActive ? 1 : 0;
  }

  clauses.push('ORDER BY i.date_posted, i.id, i.guid');

  return { sql: clauses.join('\n'), params };
}

function toDocument(kind: DocumentKind, row: InvoiceRow): LedgerDocument {
  const total =
    row.total_num !== null && row.total_denom !== null
      ? toDecimal(row.total_num, row.total_denom).abs()
      : toDecimal(0, 1);

  return {
    guid: row.guid,
    kind,
    id: row.id,
    billingId: row.billing_id ? row.billing_id : null,
    ownerName: row.owner_name,
    total,
    postedDate: toCalendarDay(row.date_posted),
    isPaid: row.lot_is_closed === 1,
    isActive: row.active === 1,
    postedLot:
      row.post_lot !== null && row.lot_account_guid !== null
        ? { guid: row.post_lot, accountGuid: row.lot_account_guid }
        : null,
  };
}

/**
 * Runs the document query against an open book database.
 */
export function queryDocuments(db: Database.Database, filter: DocumentFilter): LedgerDocument[] {
  const { sql, params } = buildDocumentQuery(filter);
  const rows = db.prepare<[QueryParams], InvoiceRow>(sql).all(params);
  return rows.map((row) => toDocument(filter.kind, row));
}

export default queryDocuments;
