// JSON payloads: query responses and contract query bodies travel as UTF-8
// JSON; cosmwasm `Binary` values inside them are padded base64.

import * as v from "valibot";
import { fromString, toString } from "uint8arrays";
import { DecodeError } from "../errors";

export const toJsonBinary = (value: unknown): Uint8Array =>
  fromString(
    JSON.stringify(value, (_k, x: unknown) => (typeof x === "bigint" ? x.toString() : x)),
    "utf8",
  );

export const fromJsonBinary = <T>(
  typeName: string,
  raw: Uint8Array,
  schema: v.GenericSchema<unknown, T>,
): T => {
  let json: unknown;
  try {
    json = JSON.parse(toString(raw, "utf8"));
  } catch (e) {
    throw new DecodeError(typeName, "invalid JSON", e);
  }
  const res = v.safeParse(schema, json);
  if (!res.success) {
    throw new DecodeError(typeName, res.issues.map((i) => i.message).join("; "));
  }
  return res.output;
};

export const toBase64 = (b: Uint8Array): string => toString(b, "base64pad");
export const fromBase64 = (s: string): Uint8Array => fromString(s, "base64pad");
