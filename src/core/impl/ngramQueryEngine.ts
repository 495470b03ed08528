import type { RecordId } from "../types.js";
import type { InvertedIndex } from "../invertedIndex.js";
import type { QueryEngine } from "../queryEngine.js";
import type { Tokenizer } from "../tokenizer.js";
import { NGramTokenizer } from "./ngramTokenizer.js";

/** Merge-join of two ascending, duplicate-free id lists. */
export function intersectSorted(a: readonly RecordId[], b: readonly RecordId[]): RecordId[] {
  const out: RecordId[] = [];
  let i = 0;
  let j = 0;

  while (i < a.length && j < b.length) {
    const x = a[i];
    const y = b[j];
    if (x === undefined || y === undefined) break;
    if (x === y) {
      out.push(x);
      i++;
      j++;
    } else if (x < y) {
      i++;
    } else {
      j++;
    }
  }

  return out;
}

export class NGramQueryEngine implements QueryEngine {
  constructor(private readonly tokenizer: Tokenizer = new NGramTokenizer()) {}

  search(query: string, index: InvertedIndex): Set<RecordId> {
    return new Set(this.match(query, index));
  }

  match(query: string, index: InvertedIndex): RecordId[] {
    const tokens = new Set(this.tokenizer.tokenize(query));
    // single-character queries produce no 2-grams and therefore match nothing
    if (tokens.size === 0) return [];

    const lists: (readonly RecordId[])[] = [];
    for (const token of tokens) {
      const postings = index.getPostings(token);
      if (!postings) return [];
      lists.push(postings.recordIds);
    }

    // shortest first; the result is the same in any order
    lists.sort((a, b) => a.length - b.length);

    const [first = [], ...rest] = lists;
    let matched: readonly RecordId[] = first;
    for (const list of rest) {
      if (matched.length === 0) break;
      matched = intersectSorted(matched, list);
    }

    return Array.from(matched);
  }
}

export function search(query: string, index: InvertedIndex, tokenizer?: Tokenizer): Set<RecordId> {
  return new NGramQueryEngine(tokenizer).search(query, index);
}
