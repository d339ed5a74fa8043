/**
 * Tests for the Eligibility Filter
 */

import { findEligiblePosting } from '../../src/matching/eligibility';
import { InMemoryBook } from '../helpers/inMemoryBook';

describe('findEligiblePosting', () => {
  const book = new InMemoryBook();
  const checking = book.addAccount('Checking');
  const receivable = book.addAccount('Accounts Receivable');
  const income = book.addAccount('Income');
  const invoice = book.addDocument({ id: 'INV-1', total: '50.00', postedDate: '2024-01-01', lotAccount: receivable });

  it('should return the unassigned control-account posting of a two-leg transaction', () => {
    const tx = book.addTransaction('payment', '2024-01-05', [
      { account: checking, value: '50' },
      { account: receivable, value: '-50' },
    ]);

    const posting = findEligiblePosting(book, tx, receivable);

    expect(posting).not.toBeNull();
    expect(posting?.accountGuid).toBe(receivable.guid);
    expect(posting?.value.toString()).toBe('-50');
  });

  it('should reject a transaction with three postings', () => {
    const tx = book.addTransaction('split payment', '2024-01-05', [
      { account: checking, value: '60' },
      { account: receivable, value: '-50' },
      { account: income, value: '-10' },
    ]);

    expect(findEligiblePosting(book, tx, receivable)).toBeNull();
  });

  it('should reject a posting already assigned to a lot', () => {
    const lot = invoice.postedLot;
    if (!lot) throw new Error('fixture invoice has no lot');
    const tx = book.addTransaction('applied payment', '2024-01-05', [
      { account: checking, value: '50' },
      { account: receivable, value: '-50', lot },
    ]);

    expect(findEligiblePosting(book, tx, receivable)).toBeNull();
  });

  it('should reject a transaction that does not touch the control account', () => {
    const tx = book.addTransaction('cash sale', '2024-01-05', [
      { account: checking, value: '50' },
      { account: income, value: '-50' },
    ]);

    expect(findEligiblePosting(book, tx, receivable)).toBeNull();
  });

  it('should compare accounts by identity, not by name', () => {
    const lookalike = book.addAccount('Accounts Receivable', income);
    const tx = book.addTransaction('payment', '2024-01-05', [
      { account: checking, value: '50' },
      { account: lookalike, value: '-50' },
    ]);

    expect(findEligiblePosting(book, tx, receivable)).toBeNull();
  });
});
