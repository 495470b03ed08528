export { NGramTokenizer, DEFAULT_GRAM_WIDTH, ngrams } from "./ngramTokenizer.js";
export { MemoryInvertedIndex } from "./memoryInvertedIndex.js";
export { MemoryIndexBuilder, buildIndex, searchableText } from "./memoryIndexBuilder.js";
export { NGramQueryEngine, intersectSorted, search } from "./ngramQueryEngine.js";
export {
  IndexStore,
  IndexNotReadyError,
  type CorpusSource,
  type IndexSnapshot,
  type IndexStoreOptions,
} from "./indexStore.js";
