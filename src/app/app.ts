import { toJsonBinary } from "../codec/json";
import { MemoryStorage } from "../core/storage";
import type {
  Api,
  AppResponse,
  BlockInfo,
  Coin,
  CosmosMsg,
  CosmosRouter,
  CustomModule,
  Querier,
  QuerierResult,
  QueryRequest,
  ReadonlyStorage,
  StargateModule,
  Storage,
  SudoMsg,
  WasmQuery,
} from "../core/types";
import { errorMessage, NotFoundError, UnsupportedError } from "../errors";
import { moduleLogger } from "../logging";
import type { ILogger } from "../logging";
import { StargateFailingModule } from "../modules/failing";
import type { Addr } from "../types/brands";
import { MockApi } from "./api";
import { BankKeeper } from "./bank";

/* ── mock contracts ──────────────────────────────────────── */

/** Answers a smart query with raw bytes, or throws to report a contract error. */
export type ContractQueryHandler = (msg: Uint8Array, storage: ReadonlyStorage, block: BlockInfo) => Uint8Array;

export type MockContract = {
  codeId: number;
  creator: string;
  admin?: string;
  ibcPort?: string;
  query: ContractQueryHandler;
};

export const DEFAULT_BLOCK: BlockInfo = {
  height: 12_345,
  time: 1_571_797_419_879_305_533n,
  chainId: "sim-testing",
};

const BLOCK_TIME_NS = 5_000_000_000n;

/**
 * In-process host for the modules: one store, the bank, a stargate module,
 * an optional custom module and a registry of mock contracts.
 *
 * Every top-level `execute` runs as a transaction: storage is restored to
 * its prior state when anything in it throws.
 */
export class App implements CosmosRouter, Querier {
  readonly storage = new MemoryStorage();
  readonly bank = new BankKeeper();
  private readonly contracts = new Map<string, MockContract>();
  private readonly log: ILogger;
  block: BlockInfo;

  constructor(
    readonly api: MockApi,
    readonly stargate: StargateModule,
    readonly custom: CustomModule | undefined,
    block: BlockInfo,
    logger?: ILogger,
  ) {
    this.block = block;
    this.log = moduleLogger("app", logger);
  }

  /* ── router (called by modules) ──────────────────────────── */

  execute(api: Api, storage: Storage, block: BlockInfo, sender: Addr, msg: CosmosMsg): AppResponse {
    switch (msg.type) {
      case "bank":
        return this.bank.execute(storage, sender, msg.msg);
      case "stargate":
        return this.stargate.execute(api, storage, this, block, sender, {
          typeUrl: msg.typeUrl,
          value: msg.value,
        });
      case "custom":
        if (!this.custom) throw new UnsupportedError("Unexpected custom exec msg: no custom module");
        return this.custom.execute(api, storage, this, block, sender, msg.msg);
    }
  }

  query(api: Api, storage: ReadonlyStorage, block: BlockInfo, request: QueryRequest): Uint8Array {
    switch (request.type) {
      case "bank":
        return this.bank.query(storage, request.query);
      case "wasm":
        return this.queryWasm(storage, block, request.query);
      case "stargate":
        return this.stargate.query(api, storage, this, block, {
          path: request.path,
          data: request.data,
        });
      case "custom":
        if (!this.custom) throw new UnsupportedError("Unexpected custom query: no custom module");
        return this.custom.query(api, storage, this, block, request.query);
    }
  }

  sudo(api: Api, storage: Storage, block: BlockInfo, msg: SudoMsg): AppResponse {
    switch (msg.type) {
      case "bank":
        return this.bank.sudo(storage, msg.msg);
      case "stargate":
        return this.stargate.sudo(api, storage, this, block, msg.msg);
    }
  }

  private contract(addr: string): MockContract {
    const c = this.contracts.get(addr);
    if (!c) throw new NotFoundError(`No such contract: ${addr}`, { addr });
    return c;
  }

  private queryWasm(storage: ReadonlyStorage, block: BlockInfo, q: WasmQuery): Uint8Array {
    switch (q.type) {
      case "smart":
        return this.contract(q.contractAddr).query(q.msg, storage, block);
      case "contractInfo": {
        const c = this.contract(q.contractAddr);
        return toJsonBinary({
          code_id: c.codeId,
          creator: c.creator,
          admin: c.admin ?? null,
          pinned: false,
          ibc_port: c.ibcPort ?? null,
        });
      }
    }
  }

  /**
   * Two-level result seen by modules. An unknown contract is a system error;
   * anything a handler or contract throws is a contract error.
   */
  rawQuery(request: QueryRequest): QuerierResult {
    if (request.type === "wasm" && !this.contracts.has(request.query.contractAddr)) {
      return { ok: false, error: `No such contract: ${request.query.contractAddr}` };
    }
    try {
      return { ok: true, value: { ok: true, value: this.query(this.api, this.storage, this.block, request) } };
    } catch (e) {
      return { ok: true, value: { ok: false, error: errorMessage(e) } };
    }
  }

  /* ── test-facing surface ─────────────────────────────────── */

  registerContract(addr: string, contract: MockContract): void {
    this.contracts.set(this.api.addrValidate(addr), contract);
  }

  initBalance(addr: string, coins: readonly Coin[]): void {
    this.bank.initBalance(this.storage, this.api.addrValidate(addr), coins);
  }

  /** Runs `msg` as one transaction; on failure the store is rolled back and the error rethrown. */
  executeTx(sender: Addr, msg: CosmosMsg): AppResponse {
    const snap = this.storage.snapshot();
    try {
      const res = this.execute(this.api, this.storage, this.block, sender, msg);
      this.log.debug({ sender, kind: msg.type, events: res.events.length }, "executed");
      return res;
    } catch (e) {
      this.storage.restore(snap);
      this.log.debug({ sender, kind: msg.type, err: errorMessage(e) }, "rolled back");
      throw e;
    }
  }

  executeStargate(sender: Addr, typeUrl: string, value: Uint8Array): AppResponse {
    return this.executeTx(sender, { type: "stargate", typeUrl, value });
  }

  queryRequest(request: QueryRequest): Uint8Array {
    return this.query(this.api, this.storage, this.block, request);
  }

  queryStargate(path: string, data: Uint8Array): Uint8Array {
    return this.queryRequest({ type: "stargate", path, data });
  }

  queryCustom(query: unknown): Uint8Array {
    return this.queryRequest({ type: "custom", query });
  }

  sudoTx(msg: SudoMsg): AppResponse {
    const snap = this.storage.snapshot();
    try {
      return this.sudo(this.api, this.storage, this.block, msg);
    } catch (e) {
      this.storage.restore(snap);
      throw e;
    }
  }

  balance(addr: string, denom: string): bigint {
    return this.bank.balance(this.storage, addr, denom);
  }

  supply(denom: string): bigint {
    return this.bank.supply(this.storage, denom);
  }

  nextBlock(): BlockInfo {
    this.block = {
      ...this.block,
      height: this.block.height + 1,
      time: this.block.time + BLOCK_TIME_NS,
    };
    return this.block;
  }
}

/* ── builder ─────────────────────────────────────────────── */

export class AppBuilder {
  private stargate: StargateModule = new StargateFailingModule();
  private custom?: CustomModule;
  private block: BlockInfo = DEFAULT_BLOCK;
  private logger?: ILogger;
  private readonly balances: [string, Coin[]][] = [];

  withStargate(module: StargateModule): this {
    this.stargate = module;
    return this;
  }

  withCustom(module: CustomModule): this {
    this.custom = module;
    return this;
  }

  withBlock(block: Partial<BlockInfo>): this {
    this.block = { ...this.block, ...block };
    return this;
  }

  withLogger(logger: ILogger): this {
    this.logger = logger;
    return this;
  }

  withBalance(addr: string, coins: Coin[]): this {
    this.balances.push([addr, coins]);
    return this;
  }

  build(): App {
    const app = new App(new MockApi(), this.stargate, this.custom, this.block, this.logger);
    for (const [addr, coins] of this.balances) app.initBalance(addr, coins);
    return app;
  }
}
