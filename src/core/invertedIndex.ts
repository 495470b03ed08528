import type { RecordId, Token } from "./types.js";

export interface PostingList {
  token: Token;
  /** number of records containing the token */
  df: number;
  /** sorted ascending, no duplicates */
  recordIds: readonly RecordId[];
}

export interface IndexStats {
  recordCount: number;
  tokenCount: number;
  /** sum of all posting list lengths */
  postingCount: number;
  gramWidth: number;
}

/**
 * Read-only inverted index mapping token -> postings.
 *
 * Contract notes:
 * - a token absent from the index is equivalent to an empty posting list
 * - `getPostings` returns record ids sorted ascending for merge/intersect
 * - instances never change after construction; rebuilds produce a new index
 */
export interface InvertedIndex {
  getPostings(token: Token): PostingList | undefined;
  hasToken(token: Token): boolean;
  tokens(): IterableIterator<Token>;

  getStats(): IndexStats;
}
