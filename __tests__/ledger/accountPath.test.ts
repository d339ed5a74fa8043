/**
 * Tests for account path resolution
 */

import { findAccountByPath, lookupByName } from '../../src/ledger/accountPath';
import { InMemoryBook } from '../helpers/inMemoryBook';

describe('account path resolution', () => {
  const createBook = () => {
    const book = new InMemoryBook();
    const assets = book.addAccount('Assets');
    const current = book.addAccount('Current Assets', assets);
    const checking = book.addAccount('Checking Account', current);
    const receivable = book.addAccount('Accounts Receivable', assets);
    const expenses = book.addAccount('Expenses');
    const bank = book.addAccount('Bank', expenses);
    book.addAccount('Fees', bank);
    const fees = book.addAccount('Fees', expenses);
    return { book, assets, checking, receivable, fees };
  };

  describe('findAccountByPath', () => {
    it('should resolve a full path', () => {
      const { book, checking } = createBook();
      expect(findAccountByPath(book, 'Assets:Current Assets:Checking Account')).toBe(checking);
    });

    it('should resolve a top-level account', () => {
      const { book, assets } = createBook();
      expect(findAccountByPath(book, 'Assets')).toBe(assets);
    });

    it('should find a segment among deeper descendants', () => {
      const { book, checking } = createBook();
      expect(findAccountByPath(book, 'Assets:Checking Account')).toBe(checking);
    });

    it('should prefer a direct child over a deeper account of the same name', () => {
      const { book, fees } = createBook();
      expect(findAccountByPath(book, 'Expenses:Fees')).toBe(fees);
    });

    it('should return null when a segment is missing', () => {
      const { book } = createBook();
      expect(findAccountByPath(book, 'Assets:Savings Account')).toBeNull();
      expect(findAccountByPath(book, 'Liabilities:Accounts Payable')).toBeNull();
    });

    it('should compare names exactly', () => {
      const { book } = createBook();
      expect(findAccountByPath(book, 'assets:current assets')).toBeNull();
    });
  });

  describe('lookupByName', () => {
    it('should search descendants depth-first when no child matches', () => {
      const { book, checking, fees } = createBook();

      expect(lookupByName(book, book.root, 'Checking Account')).toBe(checking);
      expect(lookupByName(book, book.root, 'Fees')).toBe(fees);
    });

    it('should return null for a leaf', () => {
      const { book, checking } = createBook();
      expect(lookupByName(book, checking, 'Anything')).toBeNull();
    });
  });
});
