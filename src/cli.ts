#!/usr/bin/env node
import { Command } from "commander";
import { loadConfig } from "./config.js";
import { formatCliError } from "./errors.js";
import { registerSearch } from "./commands/search.js";
import { registerServe } from "./commands/serve.js";

/** Whether to show full stack traces (set DEBUG=1 in env). */
const DEBUG = Boolean(process.env.DEBUG);

async function main(): Promise<void> {
  const defaults = loadConfig();
  const program = new Command();

  program
    .name("address-search")
    .description("Substring search over address records using 2-gram indexing")
    .version("0.1.0");

  registerSearch(program, defaults);
  registerServe(program, defaults);

  await program.parseAsync();
}

main().catch((err: unknown) => {
  console.error(`Error: ${formatCliError(err)}`);
  if (DEBUG && err instanceof Error && err.stack) {
    console.error(`\nStack trace:\n${err.stack}`);
  }
  process.exit(1);
});
