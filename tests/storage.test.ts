import { describe, it, expect } from "vitest";
import * as v from "valibot";
import { MemoryStorage, pairKey, RecordMap, stringKey } from "../src/core/storage";
import { DecodeError } from "../src/errors";

const k = (...bytes: number[]) => Uint8Array.from(bytes);

describe("MemoryStorage", () => {
  it("scans half-open ranges in either order", () => {
    const s = new MemoryStorage();
    s.set(k(3), k(30));
    s.set(k(1), k(10));
    s.set(k(2), k(20));

    const keys = (start?: Uint8Array, end?: Uint8Array, order: "ascending" | "descending" = "ascending") =>
      s.range(start, end, order).map((kv) => kv.key[0]);

    expect(keys()).toEqual([1, 2, 3]);
    expect(keys(undefined, undefined, "descending")).toEqual([3, 2, 1]);
    expect(keys(k(2))).toEqual([2, 3]);
    expect(keys(k(1), k(3))).toEqual([1, 2]);
  });

  it("removes keys and copies values on write", () => {
    const s = new MemoryStorage();
    const value = k(1);
    s.set(k(7), value);
    value[0] = 99;
    expect(s.get(k(7))).toEqual(k(1));
    s.remove(k(7));
    expect(s.get(k(7))).toBeUndefined();
    expect(s.size).toBe(0);
  });

  it("restores a snapshot", () => {
    const s = new MemoryStorage();
    s.set(k(1), k(1));
    const snap = s.snapshot();
    s.set(k(2), k(2));
    s.remove(k(1));
    s.restore(snap);
    expect(s.get(k(1))).toEqual(k(1));
    expect(s.get(k(2))).toBeUndefined();
  });
});

describe("RecordMap", () => {
  const schema = v.object({ n: v.number() });

  it("stores JSON records under its namespace only", () => {
    const s = new MemoryStorage();
    const a = new RecordMap("ns", stringKey, schema);
    const b = new RecordMap("ns2", stringKey, schema);
    a.save(s, "b", { n: 2 });
    a.save(s, "a", { n: 1 });
    b.save(s, "a", { n: 3 });

    expect(a.entries(s)).toEqual([
      ["a", { n: 1 }],
      ["b", { n: 2 }],
    ]);
    expect(a.entries(s, "descending").map(([key]) => key)).toEqual(["b", "a"]);
    expect(b.entries(s)).toEqual([["a", { n: 3 }]]);
    expect(a.mayLoad(s, "c")).toBeUndefined();
    expect(a.has(s, "a")).toBe(true);

    a.remove(s, "a");
    expect(a.has(s, "a")).toBe(false);
    expect(b.has(s, "a")).toBe(true);
  });

  it("groups pair keys by their first element", () => {
    const s = new MemoryStorage();
    const m = new RecordMap("pairs", pairKey, schema);
    m.save(s, ["c1", "b"], { n: 1 });
    m.save(s, ["c2", "a"], { n: 2 });
    m.save(s, ["c1", "a"], { n: 3 });

    expect(m.entries(s).map(([key]) => key)).toEqual([
      ["c1", "a"],
      ["c1", "b"],
      ["c2", "a"],
    ]);
    expect(m.mayLoad(s, ["c1", "b"])).toEqual({ n: 1 });
  });

  it("validates what it reads back", () => {
    const s = new MemoryStorage();
    new RecordMap("ns", stringKey, v.object({ n: v.string() })).save(s, "a", { n: "x" });
    const strict = new RecordMap("ns", stringKey, schema);
    expect(() => strict.mayLoad(s, "a")).toThrow(DecodeError);
    expect(() => strict.mayLoad(s, "a")).toThrow(/^failed to decode ns: /);
  });
});
