/**
 * CSV corpus loader.
 *
 * The first row is the header; every following row becomes one record whose
 * id is its 0-based position. Rows may carry fewer or more cells than the
 * header, and the missing cells are simply absent fields.
 */
import { readFile } from "node:fs/promises";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import type { CorpusRecord } from "../core/types.js";
import { DEFAULT_ENCODINGS } from "../config.js";
import { createLogger } from "../logger.js";
import { decodeWithFallback } from "./encoding.js";
import { CorpusFormatError } from "./errors.js";

const log = createLogger("corpus.csv");

const RowsSchema = z.array(z.record(z.string(), z.string()));

export interface LoadCorpusOptions {
  /** Candidate encodings, tried in order. */
  encodings?: readonly string[];
}

export interface LoadedCorpus {
  records: CorpusRecord[];
  /** Encoding that decoded the file. */
  encoding: string;
}

/** Parse already-decoded CSV text into records. */
export function parseCorpus(text: string, path?: string): CorpusRecord[] {
  let rows: unknown;
  try {
    rows = parse(text, {
      bom: true,
      columns: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
    });
  } catch (err: unknown) {
    throw new CorpusFormatError(err instanceof Error ? err.message : String(err), path);
  }

  const checked = RowsSchema.safeParse(rows);
  if (!checked.success) {
    throw new CorpusFormatError(checked.error.issues[0]?.message ?? "unexpected row shape", path);
  }

  return checked.data.map((fields, id) => Object.freeze({ id, fields: Object.freeze(fields) }));
}

/** Read, decode and parse a CSV corpus from disk. */
export async function loadCorpus(path: string, options: LoadCorpusOptions = {}): Promise<LoadedCorpus> {
  const encodings = options.encodings ?? DEFAULT_ENCODINGS;

  const bytes = await readFile(path);
  const { text, encoding } = decodeWithFallback(bytes, encodings, path);
  const records = parseCorpus(text, path);

  log.info({ path, encoding, records: records.length }, "loaded corpus");
  return { records, encoding };
}
