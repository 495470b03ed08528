import type { Command as Cmd } from "commander";
import type { AppConfig } from "../config.js";
import { startService } from "../service.js";
import { parseList, parsePort } from "./options.js";

interface ServeOpts {
  file?: string;
  port?: number;
  metrics?: boolean;
  fields?: string[];
  display?: string[];
  encodings?: string[];
}

/** Register the `serve` subcommand. Flags override the environment. */
export function registerServe(program: Cmd, defaults: AppConfig): void {
  program
    .command("serve")
    .description("Start the HTTP search service")
    .option("-f, --file <path>", "CSV corpus to index")
    .option("-p, --port <n>", "Port to listen on", parsePort)
    .option("--metrics", "Expose Prometheus metrics on /metrics")
    .option("--fields <list>", "Comma-separated searchable columns", parseList)
    .option("--display <list>", "Comma-separated columns to return", parseList)
    .option("--encodings <list>", "Comma-separated encodings to try in order", parseList)
    .action(async (opts: ServeOpts) => {
      const { server } = await startService({
        port: opts.port ?? defaults.port,
        metricsEnabled: opts.metrics ?? defaults.metricsEnabled,
        corpusFile: opts.file ?? defaults.corpusFile,
        searchableFields: opts.fields ?? defaults.searchableFields,
        displayFields: opts.display ?? defaults.displayFields,
        encodings: opts.encodings ?? defaults.encodings,
      });

      const shutdown = () => server.close(() => process.exit(0));
      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);
    });
}
