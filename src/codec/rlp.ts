// Field-level RLP helpers shared by every message and query codec.
//
// A message is an RLP list of its fields in declaration order. Strings are
// UTF-8 bytes, integers big-endian minimal bytes, booleans 0/1, optional
// sub-messages an empty list when absent, repeated fields a nested list.

import * as rlp from "rlp";
import { fromString, toString } from "uint8arrays";
import { DecodeError, errorMessage } from "../errors";

export type Field = Uint8Array | rlp.NestedUint8Array;

/* ── encoders ── */
export const str = (s: string): Uint8Array => fromString(s, "utf8");

export const uint = (n: bigint | number): Uint8Array => {
  let big = BigInt(n);
  if (big < 0n) throw new RangeError(`cannot encode negative integer ${n}`);
  const out: number[] = [];
  while (big > 0n) {
    out.unshift(Number(big & 0xffn));
    big >>= 8n;
  }
  return Uint8Array.from(out);
};

export const bool = (b: boolean): Uint8Array => uint(b ? 1 : 0);

export const opt = <T>(value: T | undefined, enc: (v: T) => rlp.Input[]): rlp.Input[] =>
  value === undefined ? [] : enc(value);

export const list = <T>(values: readonly T[], enc: (v: T) => rlp.Input): rlp.Input[] =>
  values.map(enc);

/* ── sequential reader ── */

/**
 * Reads fields front to back. Missing trailing fields decode to their zero
 * value, the way an older encoder's output reads under a newer schema.
 */
export class FieldReader {
  private i = 0;

  constructor(
    readonly typeName: string,
    private readonly fields: Field[],
  ) {}

  private next(): Field | undefined {
    return this.fields[this.i++];
  }

  private bytesField(name: string): Uint8Array | undefined {
    const f = this.next();
    if (f === undefined) return undefined;
    if (Array.isArray(f)) throw new DecodeError(this.typeName, `field ${name}: expected bytes, got list`);
    return f;
  }

  string(name: string): string {
    const b = this.bytesField(name);
    return b === undefined ? "" : toString(b, "utf8");
  }

  bytes(name: string): Uint8Array {
    return this.bytesField(name) ?? new Uint8Array();
  }

  bigint(name: string): bigint {
    const b = this.bytesField(name);
    if (b === undefined || b.length === 0) return 0n;
    if (b[0] === 0) throw new DecodeError(this.typeName, `field ${name}: non-canonical integer`);
    return BigInt("0x" + toString(b, "base16"));
  }

  u32(name: string): number {
    const n = this.bigint(name);
    if (n > 0xffffffffn) throw new DecodeError(this.typeName, `field ${name}: out of u32 range`);
    return Number(n);
  }

  bool(name: string): boolean {
    return this.bigint(name) !== 0n;
  }

  /** Nested message; an empty list means absent. */
  optional<T>(name: string, read: (r: FieldReader) => T): T | undefined {
    const f = this.next();
    if (f === undefined) return undefined;
    if (!Array.isArray(f)) throw new DecodeError(this.typeName, `field ${name}: expected list, got bytes`);
    return f.length === 0 ? undefined : read(new FieldReader(`${this.typeName}.${name}`, f));
  }

  repeated<T>(name: string, read: (f: Field, typeName: string) => T): T[] {
    const f = this.next();
    if (f === undefined) return [];
    if (!Array.isArray(f)) throw new DecodeError(this.typeName, `field ${name}: expected list, got bytes`);
    return f.map((item) => read(item, `${this.typeName}.${name}`));
  }
}

export const readU32Item = (f: Field, typeName: string): number =>
  new FieldReader(typeName, [f]).u32("item");

/* ── top-level ── */

export interface Codec<T> {
  readonly typeName: string;
  encode(msg: T): Uint8Array;
  decode(raw: Uint8Array): T;
}

export const defineCodec = <T>(
  typeName: string,
  fields: (msg: T) => rlp.Input[],
  read: (r: FieldReader) => T,
): Codec<T> => ({
  typeName,
  encode: (msg) => rlp.encode(fields(msg)),
  decode: (raw) => {
    let decoded: Field;
    try {
      decoded = rlp.decode(raw);
    } catch (e) {
      throw new DecodeError(typeName, errorMessage(e), e);
    }
    if (!Array.isArray(decoded)) throw new DecodeError(typeName, "expected an RLP list");
    return read(new FieldReader(typeName, decoded));
  },
});
