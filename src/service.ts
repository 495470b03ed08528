import type http from "node:http";

import type { AppConfig } from "./config.js";
import { loadCorpus } from "./corpus/csvLoader.js";
import { createInMemoryEngine, type Engine } from "./http/engine.js";
import { startServer } from "./http/server.js";
import { createLogger } from "./logger.js";

const log = createLogger("service");

export interface RunningService {
  server: http.Server;
  port: number;
  engine: Engine;
}

/**
 * Start the HTTP service and, when a corpus file is configured, build the
 * first index snapshot. The server answers /health while the build runs.
 */
export async function startService(config: AppConfig): Promise<RunningService> {
  const corpusFile = config.corpusFile;

  const engine = createInMemoryEngine({
    searchableFields: config.searchableFields,
    displayFields: config.displayFields,
    source: corpusFile
      ? async () => (await loadCorpus(corpusFile, { encodings: config.encodings })).records
      : undefined,
  });

  const { server, port } = await startServer({ port: config.port, metricsEnabled: config.metricsEnabled, engine });
  log.info({ port }, "listening");

  if (engine.canRebuild()) {
    try {
      log.info(await engine.rebuild(), "index ready");
    } catch (err: unknown) {
      log.error({ err, corpusFile }, "initial index build failed");
    }
  } else {
    log.warn("no corpus file configured; searches return 503 until an index is published");
  }

  return { server, port, engine };
}
