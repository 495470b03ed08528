import type { RecordId, Token } from "../types.js";
import type { InvertedIndex, IndexStats, PostingList } from "../invertedIndex.js";

/**
 * Frozen in-memory inverted index.
 *
 * Data structure:
 * - token -> sorted, deduplicated array of record ids
 *
 * Built once by the index builder from token -> Set<RecordId>; the sets are
 * materialized into sorted arrays up front so every lookup is merge-ready.
 */
export class MemoryInvertedIndex implements InvertedIndex {
  private readonly tokenToRecords = new Map<Token, readonly RecordId[]>();
  private readonly postingCount: number;

  constructor(
    postings: ReadonlyMap<Token, ReadonlySet<RecordId>>,
    private readonly recordCount: number,
    private readonly gramWidth: number,
  ) {
    let total = 0;
    for (const [token, ids] of postings) {
      if (ids.size === 0) continue;
      const sorted = Object.freeze(Array.from(ids).sort((a, b) => a - b));
      this.tokenToRecords.set(token, sorted);
      total += sorted.length;
    }
    this.postingCount = total;
  }

  getPostings(token: Token): PostingList | undefined {
    const recordIds = this.tokenToRecords.get(token);
    if (!recordIds) return undefined;

    return {
      token,
      df: recordIds.length,
      recordIds,
    };
  }

  hasToken(token: Token): boolean {
    return this.tokenToRecords.has(token);
  }

  tokens(): IterableIterator<Token> {
    return this.tokenToRecords.keys();
  }

  getStats(): IndexStats {
    return {
      recordCount: this.recordCount,
      tokenCount: this.tokenToRecords.size,
      postingCount: this.postingCount,
      gramWidth: this.gramWidth,
    };
  }
}
