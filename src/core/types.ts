import type { Addr } from "../types/brands";

export type Big = bigint;

/* ── coins ───────────────────────────────────────────────── */
export type Coin = { denom: string; amount: Big };

/** Coin as it travels on the wire: the amount is a decimal string. */
export type ProtoCoin = { denom: string; amount: string };

/* ── events / responses ──────────────────────────────────── */
export type Attribute = { key: string; value: string };
export type Event = { type: string; attributes: Attribute[] };

export type AppResponse = {
  events: Event[];
  data?: Uint8Array;
};

export const emptyResponse = (): AppResponse => ({ events: [] });

export const event = (type: string, ...attrs: [string, string][]): Event => ({
  type,
  attributes: attrs.map(([key, value]) => ({ key, value })),
});

/* ── block / api ─────────────────────────────────────────── */
export type BlockInfo = {
  height: number;
  time: Big; // nanoseconds since Unix epoch
  chainId: string;
};

export interface Api {
  addrValidate(input: string): Addr;
}

/* ── generic envelopes ───────────────────────────────────── */
export type StargateMsg = { typeUrl: string; value: Uint8Array };
export type StargateQuery = { path: string; data: Uint8Array };
export type Empty = Record<string, never>;

/* ── native messages ─────────────────────────────────────── */
export type BankMsg =
  | { type: "send"; toAddress: string; amount: Coin[] }
  | { type: "burn"; amount: Coin[] };

export type BankSudo = { type: "mint"; toAddress: string; amount: Coin[] };

export type CosmosMsg =
  | { type: "bank"; msg: BankMsg }
  | ({ type: "stargate" } & StargateMsg)
  | { type: "custom"; msg: unknown };

export type SudoMsg =
  | { type: "bank"; msg: BankSudo }
  | { type: "stargate"; msg: Empty };

/* ── native queries ──────────────────────────────────────── */
export type BankQuery =
  | { type: "balance"; address: string; denom: string }
  | { type: "allBalances"; address: string }
  | { type: "supply"; denom: string };

export type WasmQuery =
  | { type: "smart"; contractAddr: string; msg: Uint8Array }
  | { type: "contractInfo"; contractAddr: string };

export type QueryRequest =
  | { type: "bank"; query: BankQuery }
  | { type: "wasm"; query: WasmQuery }
  | ({ type: "stargate" } & StargateQuery)
  | { type: "custom"; query: unknown };

/* ── two-level query result ──────────────────────────────── */
export type ContractResult<T> = { ok: true; value: T } | { ok: false; error: string };
export type SystemResult<T> = { ok: true; value: T } | { ok: false; error: string };
export type QuerierResult = SystemResult<ContractResult<Uint8Array>>;

/* ── storage ─────────────────────────────────────────────── */
export type Order = "ascending" | "descending";
export type KV = { key: Uint8Array; value: Uint8Array };

export interface ReadonlyStorage {
  get(key: Uint8Array): Uint8Array | undefined;
  /** Half-open range [start, end); `undefined` leaves a side unbounded. */
  range(start: Uint8Array | undefined, end: Uint8Array | undefined, order: Order): KV[];
}

export interface Storage extends ReadonlyStorage {
  set(key: Uint8Array, value: Uint8Array): void;
  remove(key: Uint8Array): void;
}

/* ── router / querier seen from inside a module ──────────── */
export interface Querier {
  rawQuery(request: QueryRequest): QuerierResult;
}

export interface CosmosRouter {
  execute(api: Api, storage: Storage, block: BlockInfo, sender: Addr, msg: CosmosMsg): AppResponse;
  query(api: Api, storage: ReadonlyStorage, block: BlockInfo, request: QueryRequest): Uint8Array;
  sudo(api: Api, storage: Storage, block: BlockInfo, msg: SudoMsg): AppResponse;
}

/* ── module dispatch contract ────────────────────────────── */
export interface Module<ExecT, QueryT, SudoT> {
  execute(
    api: Api,
    storage: Storage,
    router: CosmosRouter,
    block: BlockInfo,
    sender: Addr,
    msg: ExecT,
  ): AppResponse;
  query(
    api: Api,
    storage: ReadonlyStorage,
    querier: Querier,
    block: BlockInfo,
    request: QueryT,
  ): Uint8Array;
  sudo(api: Api, storage: Storage, router: CosmosRouter, block: BlockInfo, msg: SudoT): AppResponse;
}

export type StargateModule = Module<StargateMsg, StargateQuery, Empty>;
export type CustomModule = Module<unknown, unknown, Empty>;
