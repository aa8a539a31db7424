import { defineCodec, opt, str } from "./rlp";
import { pageFields, readPage } from "./messages";
import type { PageRequest } from "./messages";

/* ── cosmos bank ─────────────────────────────────────────── */

export type QueryAllBalancesRequest = { address: string; pagination?: PageRequest };
export type QueryBalanceRequest = { address: string; denom: string };
export type QuerySupplyOfRequest = { denom: string };

export const queryAllBalancesRequest = defineCodec<QueryAllBalancesRequest>(
  "QueryAllBalancesRequest",
  (q) => [str(q.address), opt(q.pagination, pageFields)],
  (r) => ({ address: r.string("address"), pagination: r.optional("pagination", readPage) }),
);

export const queryBalanceRequest = defineCodec<QueryBalanceRequest>(
  "QueryBalanceRequest",
  (q) => [str(q.address), str(q.denom)],
  (r) => ({ address: r.string("address"), denom: r.string("denom") }),
);

export const querySupplyOfRequest = defineCodec<QuerySupplyOfRequest>(
  "QuerySupplyOfRequest",
  (q) => [str(q.denom)],
  (r) => ({ denom: r.string("denom") }),
);

/* ── cosmwasm ────────────────────────────────────────────── */

export type QuerySmartContractStateRequest = { address: string; queryData: Uint8Array };
export type QueryContractInfoRequest = { address: string };

export const querySmartContractStateRequest = defineCodec<QuerySmartContractStateRequest>(
  "QuerySmartContractStateRequest",
  (q) => [str(q.address), q.queryData],
  (r) => ({ address: r.string("address"), queryData: r.bytes("query_data") }),
);

export const queryContractInfoRequest = defineCodec<QueryContractInfoRequest>(
  "QueryContractInfoRequest",
  (q) => [str(q.address)],
  (r) => ({ address: r.string("address") }),
);

/* ── coreum asset/ft, asset/nft, cosmos nft ──────────────── */

export type QueryTokenRequest = { denom: string };
export type QueryTokensRequest = { pagination?: PageRequest; issuer: string };
export type QueryClassRequest = { id: string };
export type QueryClassesRequest = { pagination?: PageRequest; issuer: string };
export type QueryNftRequest = { classId: string; id: string };
export type QueryNftsRequest = { classId: string; owner: string; pagination?: PageRequest };
export type QueryOwnerRequest = { classId: string; id: string };

export const queryTokenRequest = defineCodec<QueryTokenRequest>(
  "QueryTokenRequest",
  (q) => [str(q.denom)],
  (r) => ({ denom: r.string("denom") }),
);

export const queryTokensRequest = defineCodec<QueryTokensRequest>(
  "QueryTokensRequest",
  (q) => [opt(q.pagination, pageFields), str(q.issuer)],
  (r) => ({ pagination: r.optional("pagination", readPage), issuer: r.string("issuer") }),
);

export const queryClassRequest = defineCodec<QueryClassRequest>(
  "QueryClassRequest",
  (q) => [str(q.id)],
  (r) => ({ id: r.string("id") }),
);

export const queryClassesRequest = defineCodec<QueryClassesRequest>(
  "QueryClassesRequest",
  (q) => [opt(q.pagination, pageFields), str(q.issuer)],
  (r) => ({ pagination: r.optional("pagination", readPage), issuer: r.string("issuer") }),
);

export const queryNftRequest = defineCodec<QueryNftRequest>(
  "QueryNftRequest",
  (q) => [str(q.classId), str(q.id)],
  (r) => ({ classId: r.string("class_id"), id: r.string("id") }),
);

export const queryNftsRequest = defineCodec<QueryNftsRequest>(
  "QueryNftsRequest",
  (q) => [str(q.classId), str(q.owner), opt(q.pagination, pageFields)],
  (r) => ({
    classId: r.string("class_id"),
    owner: r.string("owner"),
    pagination: r.optional("pagination", readPage),
  }),
);

export const queryOwnerRequest = defineCodec<QueryOwnerRequest>(
  "QueryOwnerRequest",
  (q) => [str(q.classId), str(q.id)],
  (r) => ({ classId: r.string("class_id"), id: r.string("id") }),
);
