import * as v from "valibot";
import { fromJsonBinary } from "../codec/json";
import { ContractQueryError, SystemQueryError } from "../errors";
import type { Querier, QueryRequest } from "./types";

/* ── native answer shapes (cosmwasm JSON) ────────────────── */

export const jsonCoinSchema = v.object({ denom: v.string(), amount: v.string() });

export const balanceResponseSchema = v.object({ amount: jsonCoinSchema });
export const allBalanceResponseSchema = v.object({ amount: v.array(jsonCoinSchema) });
export const supplyResponseSchema = v.object({ amount: jsonCoinSchema });

export const contractInfoResponseSchema = v.object({
  code_id: v.number(),
  creator: v.string(),
  admin: v.nullish(v.string()),
  pinned: v.boolean(),
  ibc_port: v.nullish(v.string()),
});
export type ContractInfoResponse = v.InferOutput<typeof contractInfoResponseSchema>;

/**
 * Unwraps the two-level querier result. A contract's own error keeps its
 * message untouched; only a failure of the querier itself is wrapped.
 */
export const rawQueryUnwrap = (querier: Querier, request: QueryRequest): Uint8Array => {
  const res = querier.rawQuery(request);
  if (!res.ok) throw new SystemQueryError(res.error);
  if (!res.value.ok) throw new ContractQueryError(res.value.error);
  return res.value.value;
};

export const queryAs = <T>(
  querier: Querier,
  request: QueryRequest,
  typeName: string,
  schema: v.GenericSchema<unknown, T>,
): T => fromJsonBinary(typeName, rawQueryUnwrap(querier, request), schema);
