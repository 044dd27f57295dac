import http from "node:http";
import { randomUUID } from "node:crypto";

import { DuplicateTitleError, FieldTooLongError, LockFailureError } from "../core/errors.js";
import { isDupePolicy, type DupePolicy } from "../core/types.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import { openEngine, type Engine } from "./engine.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { asString, checkField, isRecord, parseIntParam, pushErr } from "./validation.js";

const SERVICE = "termdex";
const VERSION = "0.1.0";
const MAX_LIMIT = 1000;
const DOCUMENT_PREFIX = "/api/documents/";

export interface ServerOptions {
  port?: number;
  host?: string;
  engine?: Engine;
  logger?: Logger;
}

class BadRequest extends Error {}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const engine = opts.engine ?? openEngine(undefined);
  const log = (opts.logger ?? rootLogger).child({ module: "http" });

  async function handle(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const fail = (p: Omit<Problem, "type" | "title" | "instance" | "requestId">) =>
      sendProblem(res, problem({ ...p, instance: url.pathname, requestId }));

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
        });
      }

      if (req.method === "GET" && url.pathname === "/api/stats") {
        return sendJson(res, 200, await engine.stats());
      }

      if (req.method === "POST" && url.pathname === "/api/documents") {
        if (!isJson(req)) {
          return fail({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json" });
        }
        const body = await readJson(req);
        if (!isRecord(body)) {
          return fail({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object" });
        }

        const errors: FieldError[] = [];
        const title = checkField(errors, "$.title", body.title);
        const path = checkField(errors, "$.path", body.path);
        const text = asString(body.text);
        if (text === undefined) pushErr(errors, "$.text", "must be a string");

        let dupe: DupePolicy = "fail";
        if (body.dupe !== undefined) {
          const d = asString(body.dupe);
          if (d !== undefined && isDupePolicy(d)) dupe = d;
          else pushErr(errors, "$.dupe", "must be one of: fail, replace, rename, ignore");
        }

        if (errors.length || title === undefined || path === undefined || text === undefined) {
          return fail({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", errors });
        }

        const outcome = await engine.submit({ title, path, text, dupe });
        return sendJson(res, outcome.status === "ignored" ? 200 : 201, outcome);
      }

      if (req.method === "GET" && url.pathname === "/api/search") {
        const started = Date.now();
        const errors: FieldError[] = [];

        const query = url.searchParams.get("s");
        if (!query?.trim()) pushErr(errors, "s", "missing search terms");

        const rawLimit = url.searchParams.get("limit");
        const limit = parseIntParam(rawLimit);
        if (rawLimit !== null && (limit === undefined || limit < 1 || limit > MAX_LIMIT)) {
          pushErr(errors, "limit", `must be between 1 and ${MAX_LIMIT}`);
        }

        if (errors.length || !query) {
          return fail({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", errors });
        }

        const results = await engine.search(query, limit);
        return sendJson(res, 200, { results, tookMs: Date.now() - started });
      }

      if (req.method === "GET" && url.pathname.startsWith(DOCUMENT_PREFIX)) {
        const title = decodePathSegment(url.pathname.slice(DOCUMENT_PREFIX.length));
        const doc = await engine.document(title);
        if (!doc) return fail({ status: 404, code: "NOT_FOUND", detail: `no document titled ${JSON.stringify(title)}` });
        return sendJson(res, 200, doc);
      }

      return fail({ status: 404, code: "NOT_FOUND", detail: "not found" });
    } catch (e) {
      if (e instanceof BadRequest) {
        return fail({ status: 400, code: "INVALID_ARGUMENT", detail: e.message });
      }
      if (e instanceof FieldTooLongError) {
        return fail({ status: 400, code: "INVALID_ARGUMENT", detail: e.message });
      }
      if (e instanceof DuplicateTitleError) {
        return fail({ status: 409, code: "DUPLICATE_TITLE", detail: e.message });
      }
      if (e instanceof LockFailureError) {
        return fail({ status: 503, code: "UNAVAILABLE", detail: e.message });
      }
      log.error({ err: e, requestId, path: url.pathname }, "request failed");
      return fail({ status: 500, code: "INTERNAL", detail: "internal error" });
    }
  }

  return http.createServer((req, res) => {
    handle(req, res).catch((e: unknown) => {
      log.error({ err: e }, "could not write response");
      res.destroy();
    });
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 0;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, opts.host ?? "127.0.0.1", () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function decodePathSegment(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    throw new BadRequest("malformed percent-encoding in document title");
  }
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = req.headers["content-type"] ?? "";
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(String(c)));
  const raw = Buffer.concat(chunks).toString("utf8");
  if (!raw.length) return null;
  try {
    return JSON.parse(raw);
  } catch {
    throw new BadRequest("body must be valid JSON");
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
