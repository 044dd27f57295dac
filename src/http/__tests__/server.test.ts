import type http from "node:http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { openEngine, type Engine } from "../engine.js";
import { PROBLEM_CONTENT_TYPE } from "../problem.js";
import { startServer } from "../server.js";
import { isRecord } from "../validation.js";

let server: http.Server;
let engine: Engine;
let base: string;

beforeEach(async () => {
  engine = openEngine(undefined);
  const started = await startServer({ port: 0, engine });
  server = started.server;
  base = `http://127.0.0.1:${started.port}`;
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

async function readBody(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (!isRecord(body)) throw new Error(`expected a JSON object, got ${JSON.stringify(body)}`);
  return body;
}

function submit(body: unknown) {
  return fetch(`${base}/api/documents`, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("http server", () => {
  it("reports health", async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await readBody(res)).toMatchObject({ status: "ok", service: "termdex", version: "0.1.0" });
  });

  it("ingests and searches documents", async () => {
    const created = await submit({ title: "D1", path: "/a", text: "cat cat dog" });
    expect(created.status).toBe(201);
    expect(await readBody(created)).toEqual({ status: "inserted", title: "D1" });
    await submit({ title: "D2", path: "/b", text: "dog dog dog" });

    const res = await fetch(`${base}/api/search?s=${encodeURIComponent("Cats")}`);
    expect(res.status).toBe(200);
    const body = await readBody(res);
    expect(body.results).toEqual([{ score: 17609, path: "/a", title: "D1" }]);
    expect(body.tookMs).toBeTypeOf("number");
  });

  it("cuts search results to the limit", async () => {
    await submit({ title: "D1", path: "/a", text: "dog" });
    await submit({ title: "D2", path: "/b", text: "dog" });

    const res = await fetch(`${base}/api/search?s=dog&limit=1`);
    expect((await readBody(res)).results).toEqual([{ score: 0, path: "/b", title: "D2" }]);
  });

  it("answers a duplicate title with a 409 problem", async () => {
    await submit({ title: "D1", path: "/a", text: "cat" });
    const res = await submit({ title: "D1", path: "/other", text: "dog" });

    expect(res.status).toBe(409);
    expect(res.headers.get("content-type")).toBe(PROBLEM_CONTENT_TYPE);
    expect(await readBody(res)).toMatchObject({
      type: "https://errors.termdex.local/duplicate-title",
      title: "Duplicate title",
      status: 409,
      code: "DUPLICATE_TITLE",
      instance: "/api/documents",
    });
  });

  it("honours the dupe policy", async () => {
    await submit({ title: "D1", path: "/a", text: "cat" });

    const renamed = await submit({ title: "D1", path: "/b", text: "cat", dupe: "rename" });
    expect(renamed.status).toBe(201);
    expect(await readBody(renamed)).toEqual({ status: "renamed", title: "D1-1" });

    const ignored = await submit({ title: "D1", path: "/c", text: "cat", dupe: "ignore" });
    expect(ignored.status).toBe(200);
    expect(await readBody(ignored)).toEqual({ status: "ignored", title: "D1" });
  });

  it("validates submissions", async () => {
    const res = await submit({ title: "", text: 3, dupe: "merge" });
    expect(res.status).toBe(400);
    expect((await readBody(res)).errors).toEqual([
      { path: "$.title", message: "must be a non-empty string" },
      { path: "$.path", message: "must be a non-empty string" },
      { path: "$.text", message: "must be a string" },
      { path: "$.dupe", message: "must be one of: fail, replace, rename, ignore" },
    ]);
  });

  it("rejects titles too long for a snapshot", async () => {
    const res = await submit({ title: "t".repeat(65536), path: "/a", text: "cat" });
    expect(res.status).toBe(400);
    expect((await readBody(res)).errors).toEqual([{ path: "$.title", message: "must be at most 65535 bytes" }]);
  });

  it("rejects a word too long for a snapshot", async () => {
    const res = await submit({ title: "big", path: "/big", text: "x".repeat(70000) });
    expect(res.status).toBe(400);
    expect(await readBody(res)).toMatchObject({ code: "INVALID_ARGUMENT", status: 400 });

    const stats = await fetch(`${base}/api/stats`);
    expect((await readBody(stats)).documents).toBe(0);
  });

  it("requires a JSON body", async () => {
    const wrongType = await fetch(`${base}/api/documents`, { method: "POST", body: "title=D1" });
    expect(wrongType.status).toBe(415);

    const broken = await fetch(`${base}/api/documents`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{",
    });
    expect(broken.status).toBe(400);
    expect(await readBody(broken)).toMatchObject({ code: "INVALID_ARGUMENT", detail: "body must be valid JSON" });
  });

  it("validates search parameters", async () => {
    const missing = await fetch(`${base}/api/search`);
    expect(missing.status).toBe(400);
    expect((await readBody(missing)).errors).toEqual([{ path: "s", message: "missing search terms" }]);

    const badLimit = await fetch(`${base}/api/search?s=cat&limit=0`);
    expect(badLimit.status).toBe(400);
    expect((await readBody(badLimit)).errors).toEqual([{ path: "limit", message: "must be between 1 and 1000" }]);
  });

  it("serves a single document by title", async () => {
    await submit({ title: "Graph walks", path: "/g", text: "walk walk graph" });

    const res = await fetch(`${base}/api/documents/${encodeURIComponent("Graph walks")}`);
    expect(res.status).toBe(200);
    expect(await readBody(res)).toEqual({ title: "Graph walks", path: "/g", termFrequency: { walk: 1, graph: 0.5 } });

    const missing = await fetch(`${base}/api/documents/nope`);
    expect(missing.status).toBe(404);
    expect(await readBody(missing)).toMatchObject({ code: "NOT_FOUND" });
  });

  it("reports stats", async () => {
    await submit({ title: "D1", path: "/a", text: "cat dog" });
    const res = await fetch(`${base}/api/stats`);
    expect(await readBody(res)).toEqual({ documents: 1, terms: 2, internedStrings: 2 });
  });

  it("answers 503 once the index is shut down", async () => {
    await engine.shutdown();
    const res = await fetch(`${base}/api/search?s=cat`);
    expect(res.status).toBe(503);
    expect(await readBody(res)).toMatchObject({ code: "UNAVAILABLE", detail: "index is shut down" });
  });

  it("returns 404 for unknown routes", async () => {
    const res = await fetch(`${base}/nowhere`);
    expect(res.status).toBe(404);
  });
});
