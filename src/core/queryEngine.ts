import type { RecordId } from "./types.js";
import type { InvertedIndex } from "./invertedIndex.js";

/**
 * Conjunctive n-gram search over an inverted index.
 *
 * Contract notes:
 * - a record matches only if it contains every n-gram of the query
 * - a query shorter than the gram width has no n-grams and matches nothing
 * - never throws; no match is an empty result
 */
export interface QueryEngine {
  search(query: string, index: InvertedIndex): Set<RecordId>;
  /** Same matches as `search`, sorted ascending by record id. */
  match(query: string, index: InvertedIndex): RecordId[];
}
