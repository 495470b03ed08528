import { loadConfig } from "./config.js";
import { startService } from "./service.js";

const { server } = await startService(loadConfig());

function shutdown(): void {
  server.close(() => process.exit(0));
}

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
