import { describe, expect, it } from "vitest";
import { InternalConsistencyError } from "../../errors.js";
import { ArenaStringPool } from "../index.js";

describe("ArenaStringPool", () => {
  it("returns the same handle for the same text", () => {
    const pool = new ArenaStringPool();
    const a = pool.intern("search");
    expect(pool.intern("search")).toBe(a);
    expect(pool.size).toBe(1);
  });

  it("allocates dense, distinct handles in first-seen order", () => {
    const pool = new ArenaStringPool();
    expect(["alpha", "beta", "alpha", "gamma"].map((t) => pool.intern(t))).toEqual([0, 1, 0, 2]);
    expect(pool.size).toBe(3);
  });

  it("resolves handles back to their text", () => {
    const pool = new ArenaStringPool();
    const t = pool.intern("naïve");
    pool.intern("other");
    expect(pool.resolve(t)).toBe("naïve");
  });

  it("looks up without allocating", () => {
    const pool = new ArenaStringPool();
    pool.intern("known");
    expect(pool.lookup("known")).toBe(0);
    expect(pool.lookup("unknown")).toBeUndefined();
    expect(pool.size).toBe(1);
  });

  it("rejects handles it never issued", () => {
    const pool = new ArenaStringPool();
    pool.intern("only");
    expect(() => pool.resolve(1)).toThrow(InternalConsistencyError);
  });

  it("agrees across interleaved async callers", async () => {
    const pool = new ArenaStringPool();
    const words = ["x", "y", "x", "z", "y", "x"];
    const handles = await Promise.all(words.map(async (w) => pool.intern(w)));
    expect(handles).toEqual([0, 1, 0, 2, 1, 0]);
  });

  it("keeps separate numbering per pool", () => {
    const a = new ArenaStringPool();
    const b = new ArenaStringPool();
    b.intern("padding");
    expect(a.intern("word")).toBe(0);
    expect(b.intern("word")).toBe(1);
  });
});
