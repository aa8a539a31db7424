import * as v from "valibot";
import { compare, concat, fromString, toString } from "uint8arrays";
import { fromJsonBinary, toJsonBinary } from "../codec/json";
import { DecodeError } from "../errors";
import type { KV, Order, ReadonlyStorage, Storage } from "./types";

/* ── in-memory ordered store ─────────────────────────────── */

export class MemoryStorage implements Storage {
  private data = new Map<string, KV>();

  get(key: Uint8Array): Uint8Array | undefined {
    return this.data.get(toString(key, "base16"))?.value;
  }

  set(key: Uint8Array, value: Uint8Array): void {
    this.data.set(toString(key, "base16"), { key: key.slice(), value: value.slice() });
  }

  remove(key: Uint8Array): void {
    this.data.delete(toString(key, "base16"));
  }

  range(start: Uint8Array | undefined, end: Uint8Array | undefined, order: Order): KV[] {
    const out = [...this.data.values()]
      .filter(
        (kv) =>
          (start === undefined || compare(kv.key, start) >= 0) &&
          (end === undefined || compare(kv.key, end) < 0),
      )
      .sort((a, b) => compare(a.key, b.key));
    return order === "ascending" ? out : out.reverse();
  }

  get size(): number {
    return this.data.size;
  }

  snapshot(): Map<string, KV> {
    return new Map(this.data);
  }

  restore(snap: Map<string, KV>): void {
    this.data = new Map(snap);
  }
}

/* ── key codecs ──────────────────────────────────────────── */

export interface KeyCodec<K> {
  encode(key: K): Uint8Array;
  decode(raw: Uint8Array): K;
}

const utf8 = (s: string) => fromString(s, "utf8");

const lengthPrefixed = (b: Uint8Array): Uint8Array => {
  if (b.length > 0xffff) throw new DecodeError("storage key", `key segment too long (${b.length} bytes)`);
  return concat([Uint8Array.of(b.length >> 8, b.length & 0xff), b]);
};

export const stringKey: KeyCodec<string> = {
  encode: utf8,
  decode: (raw) => toString(raw, "utf8"),
};

/** (a, b) keys: `a` is length-prefixed, `b` is the raw tail, so all `b`s under one `a` are contiguous. */
export const pairKey: KeyCodec<readonly [string, string]> = {
  encode: ([a, b]) => concat([lengthPrefixed(utf8(a)), utf8(b)]),
  decode: (raw) => {
    if (raw.length < 2) throw new DecodeError("storage key", "pair key shorter than its prefix");
    const len = (raw[0] << 8) | raw[1];
    if (raw.length < 2 + len) throw new DecodeError("storage key", "pair key truncated");
    return [toString(raw.subarray(2, 2 + len), "utf8"), toString(raw.subarray(2 + len), "utf8")];
  },
};

/** Smallest key strictly greater than every key starting with `prefix`. */
const prefixEnd = (prefix: Uint8Array): Uint8Array | undefined => {
  const out = prefix.slice();
  for (let i = out.length - 1; i >= 0; i--) {
    if (out[i] < 0xff) {
      out[i]++;
      return out.subarray(0, i + 1);
    }
  }
  return undefined;
};

/* ── typed namespaced record map ─────────────────────────── */

export class RecordMap<K, V> {
  private readonly prefix: Uint8Array;

  constructor(
    readonly namespace: string,
    private readonly keys: KeyCodec<K>,
    private readonly schema: v.GenericSchema<unknown, V>,
  ) {
    this.prefix = lengthPrefixed(utf8(namespace));
  }

  private fullKey(key: K): Uint8Array {
    return concat([this.prefix, this.keys.encode(key)]);
  }

  private decodeValue(raw: Uint8Array): V {
    return fromJsonBinary(this.namespace, raw, this.schema);
  }

  has(storage: ReadonlyStorage, key: K): boolean {
    return storage.get(this.fullKey(key)) !== undefined;
  }

  mayLoad(storage: ReadonlyStorage, key: K): V | undefined {
    const raw = storage.get(this.fullKey(key));
    return raw === undefined ? undefined : this.decodeValue(raw);
  }

  save(storage: Storage, key: K, value: V): void {
    storage.set(this.fullKey(key), toJsonBinary(value));
  }

  remove(storage: Storage, key: K): void {
    storage.remove(this.fullKey(key));
  }

  entries(storage: ReadonlyStorage, order: Order = "ascending"): [K, V][] {
    return storage
      .range(this.prefix, prefixEnd(this.prefix), order)
      .map(({ key, value }): [K, V] => [
        this.keys.decode(key.subarray(this.prefix.length)),
        this.decodeValue(value),
      ]);
  }
}
