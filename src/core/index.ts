export type { CorpusRecord, RecordId, Token } from "./types.js";
export { fieldText } from "./types.js";
export type { Tokenizer } from "./tokenizer.js";
export type { InvertedIndex, IndexStats, PostingList } from "./invertedIndex.js";
export type { IndexBuilder } from "./indexBuilder.js";
export type { QueryEngine } from "./queryEngine.js";
export * from "./impl/index.js";
