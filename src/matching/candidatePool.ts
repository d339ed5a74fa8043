/**
 * Candidate Pool
 *
 * Working set of documents not yet matched in this run, keyed by guid.
 * Iteration follows insertion order (the query order); removing one
 * document leaves the relative order of the others unchanged.
 */

import type { LedgerDocument } from '../ledger/types';

export class CandidatePool {
  private readonly documents = new Map<string, LedgerDocument>();
  private readonly initialSize: number;

  constructor(documents: Iterable<LedgerDocument>) {
    for (const document of documents) {
      // First occurrence wins
      if (!this.documents.has(document.guid)) {
        this.documents.set(document.guid, document);
      }
    }
    this.initialSize = this.documents.size;
  }

  /** Number of documents the pool was seeded with */
  get seededCount(): number {
    return this.initialSize;
  }

  get size(): number {
    return this.documents.size;
  }

  has(document: LedgerDocument): boolean {
    return this.documents.has(document.guid);
  }

  /**
   * Stable copy of the current members, safe to scan while removing.
   */
  snapshot(): readonly LedgerDocument[] {
    return [...this.documents.values()];
  }

  /**
   * Removes a document once it has been matched.
   *
   * @returns False when the document was not (or no longer) in the pool
   */
  remove(document: LedgerDocument): boolean {
    return this.documents.delete(document.guid);
  }
}

export default CandidatePool;
