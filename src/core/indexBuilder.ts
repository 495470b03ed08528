import type { CorpusRecord } from "./types.js";
import type { InvertedIndex } from "./invertedIndex.js";

/**
 * Builds an inverted index over a corpus snapshot.
 *
 * Contract notes:
 * - searchable fields are concatenated in the given order with no separator,
 *   so a query may match across a field boundary
 * - a field missing from a record contributes nothing; no record is rejected
 * - the corpus is never mutated; each call returns a new index
 */
export interface IndexBuilder {
  build(corpus: Iterable<CorpusRecord>, searchableFields: readonly string[]): InvertedIndex;
}
