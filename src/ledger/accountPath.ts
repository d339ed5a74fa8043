/**
 * Account Path Resolution
 *
 * Resolves "Assets:Current Assets:Checking Account" style paths the way
 * GnuCash's lookup-by-name does: each segment is looked up among the
 * direct children first, then depth-first through the descendants.
 */

import type { Account, Book } from './types';

export const ACCOUNT_SEPARATOR = ':';

/**
 * Finds a descendant of `parent` with the given name.
 */
export function lookupByName(book: Book, parent: Account, name: string): Account | null {
  const children = book.getChildAccounts(parent);

  const direct = children.find((child) => child.name === name);
  if (direct) {
    return direct;
  }

  for (const child of children) {
    const nested = lookupByName(book, child, name);
    if (nested) {
      return nested;
    }
  }

  return null;
}

/**
 * Resolves a colon-delimited account path from the book's root.
 *
 * @returns The account, or null when any segment cannot be found
 *
 * @example
 * findAccountByPath(book, 'Assets:Current Assets:Checking Account')
 */
export function findAccountByPath(book: Book, path: string): Account | null {
  let account: Account | null = book.getRootAccount();

  for (const segment of path.split(ACCOUNT_SEPARATOR)) {
    account = lookupByName(book, account, segment);
    if (!account) {
      return null;
    }
  }

  return account;
}

export default findAccountByPath;
