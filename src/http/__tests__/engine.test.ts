import { describe, expect, it } from "vitest";
import { DuplicateTitleError, FieldTooLongError, LockFailureError } from "../../core/errors.js";
import { ArenaStringPool } from "../../core/impl/index.js";
import { countTerms, openEngine } from "../engine.js";

async function catsAndDogs() {
  const engine = openEngine(undefined);
  await engine.submit({ title: "D1", path: "/a", text: "Cat cat dog" });
  await engine.submit({ title: "D2", path: "/b", text: "dogs, dogs and more dogs" });
  return engine;
}

describe("countTerms", () => {
  it("counts occurrences per interned term", () => {
    const pool = new ArenaStringPool();
    const counts = countTerms(["a", "b", "a"], pool);
    expect(Array.from(counts)).toEqual([
      [0, 2],
      [1, 1],
    ]);
  });
});

describe("engine", () => {
  it("tokenizes, stems and ranks submitted text", async () => {
    const engine = openEngine(undefined);
    await engine.submit({ title: "D1", path: "/a", text: "Cat cat dog" });
    await engine.submit({ title: "D2", path: "/b", text: "dog dog dog" });

    expect(await engine.search("cats")).toEqual([{ score: 17609, path: "/a", title: "D1" }]);
    expect(await engine.search("dog", 1)).toEqual([{ score: 0, path: "/b", title: "D2" }]);
  });

  it("exposes documents by text", async () => {
    const engine = await catsAndDogs();
    expect(await engine.document("D1")).toEqual({ title: "D1", path: "/a", termFrequency: { cat: 1, dog: 0.5 } });
    expect(await engine.document("missing")).toBeUndefined();
  });

  it("reports stats", async () => {
    const engine = openEngine(undefined);
    await engine.submit({ title: "D1", path: "/a", text: "Cat cat dog" });
    await engine.submit({ title: "D2", path: "/b", text: "dog dog dog" });
    expect(await engine.stats()).toEqual({ documents: 2, terms: 2, internedStrings: 2 });
  });

  it("applies the dupe policy", async () => {
    const engine = await catsAndDogs();
    await expect(engine.submit({ title: "D1", path: "/c", text: "bird" })).rejects.toBeInstanceOf(DuplicateTitleError);
    await expect(engine.submit({ title: "D1", path: "/c", text: "bird", dupe: "rename" })).resolves.toEqual({
      status: "renamed",
      title: "D1-1",
    });
  });

  it("restores from its own snapshot", async () => {
    const engine = await catsAndDogs();
    const restored = openEngine(await engine.snapshot());

    expect(await restored.search("cat dog")).toEqual(await engine.search("cat dog"));
    expect(await restored.document("D2")).toEqual(await engine.document("D2"));
  });

  it("refuses work after shutdown", async () => {
    const engine = await catsAndDogs();
    const bytes = await engine.shutdown();

    await expect(openEngine(bytes).stats()).resolves.toMatchObject({ documents: 2 });
    await expect(engine.search("cat")).rejects.toBeInstanceOf(LockFailureError);
    await expect(engine.submit({ title: "late", path: "/l", text: "x" })).rejects.toBeInstanceOf(LockFailureError);
  });

  it("does not intern query words it has never seen", async () => {
    const engine = await catsAndDogs();
    const before = await engine.stats();

    expect(await engine.search("bird fish")).toEqual([]);
    expect(await engine.search("cat bird")).toEqual([{ score: 8804, path: "/a", title: "D1" }]);
    expect(await engine.stats()).toEqual(before);
  });

  it("keeps the index writable after refusing a renamed title past the limit", async () => {
    const engine = openEngine(undefined);
    const title = "t".repeat(65535);
    await engine.submit({ title, path: "/a", text: "cat" });

    await expect(engine.submit({ title, path: "/b", text: "cat", dupe: "rename" })).rejects.toMatchObject({
      field: "document title",
      byteLength: 65537,
    });
    const bytes = await engine.shutdown();
    await expect(openEngine(bytes).stats()).resolves.toMatchObject({ documents: 1 });
  });

  it("refuses a word too long for a snapshot and can still snapshot", async () => {
    const engine = await catsAndDogs();

    await expect(engine.submit({ title: "big", path: "/big", text: "x".repeat(70000) })).rejects.toBeInstanceOf(
      FieldTooLongError,
    );
    const restored = openEngine(await engine.snapshot());
    await expect(restored.stats()).resolves.toMatchObject({ documents: 2 });
  });
});
