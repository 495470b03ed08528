/**
 * `address-search search <query>`: one-shot search over a CSV corpus.
 *
 * Loads the corpus, builds the index, runs the query and prints one line per
 * matching record in corpus order.
 */
import type { Command as Cmd } from "commander";
import { buildIndex, NGramQueryEngine } from "../core/impl/index.js";
import { loadCorpus } from "../corpus/csvLoader.js";
import { formatRecord, toResultView } from "../corpus/presenter.js";
import type { AppConfig } from "../config.js";
import { parseList, parsePositiveInt } from "./options.js";

interface SearchOpts {
  file: string;
  fields?: string[];
  display?: string[];
  encodings?: string[];
  limit?: number;
  json?: boolean;
}

export interface SearchRun {
  encoding: string;
  total: number;
  lines: string[];
}

/** Execute a search and render the output lines. Separated from the command for tests. */
export async function runSearch(query: string, opts: SearchOpts, defaults: AppConfig): Promise<SearchRun> {
  const searchableFields = opts.fields ?? defaults.searchableFields;
  const displayFields = opts.display ?? defaults.displayFields;

  const { records, encoding } = await loadCorpus(opts.file, { encodings: opts.encodings ?? defaults.encodings });
  const index = buildIndex(records, searchableFields);
  const ids = new NGramQueryEngine().match(query, index);
  const shown = opts.limit !== undefined ? ids.slice(0, opts.limit) : ids;

  const matches = shown.flatMap((id) => {
    const record = records[id];
    return record ? [record] : [];
  });

  if (opts.json) {
    const body = { total: ids.length, results: matches.map((r) => toResultView(r, displayFields)) };
    return { encoding, total: ids.length, lines: [JSON.stringify(body, null, 2)] };
  }

  if (ids.length === 0) {
    return { encoding, total: 0, lines: [`No results for "${query}".`] };
  }

  return { encoding, total: ids.length, lines: matches.map((r) => formatRecord(r, displayFields)) };
}

/** Register the `search` subcommand. */
export function registerSearch(program: Cmd, defaults: AppConfig): void {
  program
    .command("search <query>")
    .description("Find every record containing all 2-grams of <query>")
    .requiredOption("-f, --file <path>", "CSV corpus to search")
    .option("--fields <list>", "Comma-separated searchable columns", parseList)
    .option("--display <list>", "Comma-separated columns to print", parseList)
    .option("--encodings <list>", "Comma-separated encodings to try in order", parseList)
    .option("--limit <n>", "Maximum records to print", parsePositiveInt)
    .option("--json", "Output as JSON")
    .action(async (query: string, opts: SearchOpts) => {
      const run = await runSearch(query, opts, defaults);
      for (const line of run.lines) console.log(line);
    });
}
