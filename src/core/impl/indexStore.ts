import type { CorpusRecord } from "../types.js";
import type { InvertedIndex } from "../invertedIndex.js";
import type { Tokenizer } from "../tokenizer.js";
import { MemoryIndexBuilder } from "./memoryIndexBuilder.js";
import { NGramTokenizer } from "./ngramTokenizer.js";

/** An immutable, published pairing of a corpus with the index built from it. */
export interface IndexSnapshot {
  readonly generation: number;
  readonly builtAt: Date;
  readonly records: readonly CorpusRecord[];
  readonly index: InvertedIndex;
  readonly tokenizer: Tokenizer;
  readonly searchableFields: readonly string[];
}

/** Supplies a fresh corpus for a rebuild. */
export type CorpusSource = () => Promise<readonly CorpusRecord[]>;

export class IndexNotReadyError extends Error {
  constructor() {
    super("index has not been built yet");
    this.name = "IndexNotReadyError";
  }
}

export interface IndexStoreOptions {
  searchableFields: readonly string[];
  tokenizer?: Tokenizer;
}

/**
 * Holds the currently published index snapshot.
 *
 * Each build goes into a fresh structure and is swapped in with a single
 * reference assignment. A reader that took a snapshot before the swap keeps
 * it for as long as it holds the reference; nothing it sees is ever mutated.
 */
export class IndexStore {
  private snapshot: IndexSnapshot | undefined;
  private generation = 0;
  private inflight: Promise<IndexSnapshot> | undefined;

  readonly tokenizer: Tokenizer;
  private readonly builder: MemoryIndexBuilder;
  private readonly searchableFields: readonly string[];

  constructor(opts: IndexStoreOptions) {
    this.tokenizer = opts.tokenizer ?? new NGramTokenizer();
    this.builder = new MemoryIndexBuilder(this.tokenizer);
    this.searchableFields = Object.freeze([...opts.searchableFields]);
  }

  isReady(): boolean {
    return this.snapshot !== undefined;
  }

  peek(): IndexSnapshot | undefined {
    return this.snapshot;
  }

  current(): IndexSnapshot {
    if (!this.snapshot) throw new IndexNotReadyError();
    return this.snapshot;
  }

  publish(records: readonly CorpusRecord[]): IndexSnapshot {
    const frozen = Object.freeze([...records]);
    const index = this.builder.build(frozen, this.searchableFields);

    const next: IndexSnapshot = Object.freeze({
      generation: ++this.generation,
      builtAt: new Date(),
      records: frozen,
      index,
      tokenizer: this.tokenizer,
      searchableFields: this.searchableFields,
    });
    this.snapshot = next;
    return next;
  }

  /**
   * Load from `source` and publish. Calls made while a rebuild is running
   * share its result. On failure the previous snapshot stays published.
   */
  rebuild(source: CorpusSource): Promise<IndexSnapshot> {
    if (this.inflight) return this.inflight;

    const run = source()
      .then((records) => this.publish(records))
      .finally(() => {
        this.inflight = undefined;
      });
    this.inflight = run;
    return run;
  }
}
