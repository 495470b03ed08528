import {
  IndexStore,
  NGramQueryEngine,
  type CorpusSource,
  type IndexSnapshot,
} from "../core/impl/index.js";
import type { CorpusRecord, RecordId } from "../core/types.js";
import { toResultView, type ResultView } from "../corpus/presenter.js";

export interface SearchQuery {
  query: string;
  limit: number;
  /** return only matches after this record id */
  after?: RecordId;
}

export interface SearchResponse {
  total: number;
  results: ResultView[];
  /** last id of this page when more matches follow */
  nextAfter: RecordId | null;
}

export interface IndexSummary {
  generation: number;
  records: number;
  tokens: number;
  builtAt: string;
}

export interface Engine {
  summary(): IndexSummary | undefined;
  search(q: SearchQuery): SearchResponse;
  get(id: RecordId): ResultView | undefined;
  canRebuild(): boolean;
  rebuild(): Promise<IndexSummary>;
}

export interface EngineOptions {
  searchableFields: readonly string[];
  displayFields: readonly string[];
  /** published immediately when given */
  records?: readonly CorpusRecord[];
  /** used by `rebuild()` */
  source?: CorpusSource;
}

export class NotConfiguredError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotConfiguredError";
  }
}

/**
 * HTTP-friendly cursor encoding.
 *
 * The engine pages by record id; the id is wrapped in JSON so the cursor can
 * grow more fields later without breaking clients.
 */
export function encodeCursor(payload: { after: RecordId }): string {
  return Buffer.from(JSON.stringify(payload), "utf8").toString("base64");
}

export function decodeCursor(cursor: string): { after: RecordId } {
  const raw = Buffer.from(cursor, "base64").toString("utf8");
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || !("after" in parsed)) {
    throw new Error("invalid cursor");
  }
  const after = parsed.after;
  if (typeof after !== "number" || !Number.isInteger(after) || after < 0) {
    throw new Error("invalid cursor");
  }
  return { after };
}

function summarize(snap: IndexSnapshot): IndexSummary {
  const stats = snap.index.getStats();
  return {
    generation: snap.generation,
    records: stats.recordCount,
    tokens: stats.tokenCount,
    builtAt: snap.builtAt.toISOString(),
  };
}

function recordById(snap: IndexSnapshot, id: RecordId): CorpusRecord | undefined {
  const byPosition = snap.records[id];
  if (byPosition && byPosition.id === id) return byPosition;
  return snap.records.find((r) => r.id === id);
}

export function createInMemoryEngine(opts: EngineOptions): Engine {
  const store = new IndexStore({ searchableFields: opts.searchableFields });
  const queries = new NGramQueryEngine(store.tokenizer);
  const displayFields = opts.displayFields;

  if (opts.records) store.publish(opts.records);

  return {
    summary() {
      const snap = store.peek();
      return snap ? summarize(snap) : undefined;
    },
    search(q) {
      // one snapshot for the whole request, even if a rebuild swaps mid-way
      const snap = store.current();
      const ids = queries.match(q.query, snap.index);

      let start = 0;
      if (q.after !== undefined) {
        const after = q.after;
        start = ids.findIndex((id) => id > after);
        if (start < 0) start = ids.length;
      }

      const page = ids.slice(start, start + q.limit);
      const results: ResultView[] = [];
      for (const id of page) {
        const record = recordById(snap, id);
        if (record) results.push(toResultView(record, displayFields));
      }

      const last = page[page.length - 1];
      return {
        total: ids.length,
        results,
        nextAfter: start + q.limit < ids.length && last !== undefined ? last : null,
      };
    },
    get(id) {
      const record = recordById(store.current(), id);
      return record ? toResultView(record, displayFields) : undefined;
    },
    canRebuild() {
      return opts.source !== undefined;
    },
    async rebuild() {
      if (!opts.source) throw new NotConfiguredError("no corpus source configured");
      return summarize(await store.rebuild(opts.source));
    },
  };
}
