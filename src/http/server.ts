import http from "node:http";
import { randomUUID } from "node:crypto";

import { IndexNotReadyError } from "../core/impl/index.js";
import { createLogger } from "../logger.js";
import { PROBLEM_CONTENT_TYPE, problem, type Problem } from "./problem.js";
import { checkSearchRequest, isRecord } from "./validation.js";
import { encodeCursor, NotConfiguredError, type Engine } from "./engine.js";
import { SearchMetrics } from "./metrics.js";

const SERVICE = "address-ngram-search";
const VERSION = "0.1.0";

const log = createLogger("http");

export interface ServerOptions {
  port?: number;
  metricsEnabled?: boolean;
  engine: Engine;
}

export function createServer(opts: ServerOptions): http.Server {
  const start = Date.now();
  const engine = opts.engine;
  const metrics = opts.metricsEnabled ? new SearchMetrics(engine) : undefined;

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        const index = engine.summary();
        return sendJson(res, 200, {
          status: index ? "ok" : "starting",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          index: index ?? null,
        });
      }

      if (req.method === "GET" && url.pathname === "/metrics") {
        if (!metrics) {
          return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "metrics not enabled", instance: url.pathname, requestId }));
        }
        const { contentType, body } = await metrics.render();
        res.statusCode = 200;
        res.setHeader("content-type", contentType);
        res.end(body);
        return;
      }

      if (req.method === "POST" && url.pathname === "/search") {
        if (!isJson(req)) {
          return sendProblem(res, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
        }

        const started = Date.now();
        const body = await readJson(req);
        if (!body.ok || !isRecord(body.value)) {
          metrics?.recordSearch("invalid");
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be a JSON object", instance: url.pathname, requestId }));
        }
        const checked = checkSearchRequest(body.value);
        if (!checked.ok) {
          metrics?.recordSearch("invalid");
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors: checked.errors }));
        }

        const matchStarted = process.hrtime.bigint();
        const r = engine.search(checked.value);
        metrics?.recordSearch(r.total > 0 ? "hit" : "miss", Number(process.hrtime.bigint() - matchStarted) / 1e9);

        return sendJson(res, 200, {
          total: r.total,
          results: r.results,
          page: { nextCursor: r.nextAfter !== null ? encodeCursor({ after: r.nextAfter }) : null },
          tookMs: Date.now() - started,
        });
      }

      const recordMatch = /^\/records\/(\d+)$/.exec(url.pathname);
      if (req.method === "GET" && recordMatch) {
        const record = engine.get(Number(recordMatch[1]));
        if (!record) {
          return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "record not found", instance: url.pathname, requestId }));
        }
        return sendJson(res, 200, record);
      }

      if (req.method === "POST" && url.pathname === "/index/rebuild") {
        if (!engine.canRebuild()) {
          return sendProblem(res, problem({ status: 409, code: "NOT_CONFIGURED", detail: "no corpus source configured", instance: url.pathname, requestId }));
        }
        const started = Date.now();
        const summary = await engine.rebuild();
        log.info({ requestId, generation: summary.generation, records: summary.records }, "index rebuilt");
        return sendJson(res, 200, {
          generation: summary.generation,
          records: summary.records,
          tokens: summary.tokens,
          tookMs: Date.now() - started,
        });
      }

      return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
    } catch (e) {
      if (e instanceof IndexNotReadyError) {
        return sendProblem(res, problem({ status: 503, code: "UNAVAILABLE", detail: e.message, instance: url.pathname, requestId }));
      }
      if (e instanceof NotConfiguredError) {
        return sendProblem(res, problem({ status: 409, code: "NOT_CONFIGURED", detail: e.message, instance: url.pathname, requestId }));
      }
      if (url.pathname === "/search") metrics?.recordSearch("error");
      log.error({ err: e, requestId, path: url.pathname }, "request failed");
      return sendProblem(res, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }));
    }
  });
}

export async function startServer(opts: ServerOptions): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? Number(process.env.PORT ?? 3000);

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<{ ok: true; value: unknown } | { ok: false }> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.length) return { ok: true, value: null };
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch {
    return { ok: false };
  }
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, body: Problem): void {
  const data = JSON.stringify(body);
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
