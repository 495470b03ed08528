import { fieldText, type CorpusRecord, type RecordId, type Token } from "../types.js";
import type { IndexBuilder } from "../indexBuilder.js";
import type { Tokenizer } from "../tokenizer.js";
import { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
import { NGramTokenizer } from "./ngramTokenizer.js";

/** Searchable text of one record: the configured fields joined with no separator. */
export function searchableText(record: CorpusRecord, searchableFields: readonly string[]): string {
  let text = "";
  for (const field of searchableFields) text += fieldText(record, field);
  return text;
}

export class MemoryIndexBuilder implements IndexBuilder {
  constructor(private readonly tokenizer: Tokenizer) {}

  build(corpus: Iterable<CorpusRecord>, searchableFields: readonly string[]): MemoryInvertedIndex {
    const postings = new Map<Token, Set<RecordId>>();
    let recordCount = 0;

    for (const record of corpus) {
      recordCount++;

      for (const token of this.tokenizer.tokenize(searchableText(record, searchableFields))) {
        let ids = postings.get(token);
        if (!ids) {
          ids = new Set();
          postings.set(token, ids);
        }
        ids.add(record.id);
      }
    }

    return new MemoryInvertedIndex(postings, recordCount, this.tokenizer.width);
  }
}

export function buildIndex(
  corpus: Iterable<CorpusRecord>,
  searchableFields: readonly string[],
  tokenizer: Tokenizer = new NGramTokenizer(),
): MemoryInvertedIndex {
  return new MemoryIndexBuilder(tokenizer).build(corpus, searchableFields);
}
