import { toBase64, toJsonBinary } from "../codec/json";
import {
  queryAllBalancesRequest,
  queryBalanceRequest,
  queryContractInfoRequest,
  querySmartContractStateRequest,
  querySupplyOfRequest,
} from "../codec/queries";
import {
  allBalanceResponseSchema,
  balanceResponseSchema,
  contractInfoResponseSchema,
  queryAs,
  rawQueryUnwrap,
  supplyResponseSchema,
} from "../core/querier";
import { emptyResponse } from "../core/types";
import type {
  Api,
  AppResponse,
  BlockInfo,
  CosmosRouter,
  Empty,
  Querier,
  ReadonlyStorage,
  StargateModule,
  StargateMsg,
  StargateQuery,
  Storage,
} from "../core/types";
import { UnsupportedError } from "../errors";
import { moduleLogger } from "../logging";
import type { ILogger } from "../logging";
import type { Addr } from "../types/brands";
import { hexData } from "./failing";
import {
  QUERY_ALL_BALANCES_PATH,
  QUERY_BALANCE_PATH,
  QUERY_SUPPLY_PATH,
  QUERY_WASM_CONTRACT_INFO_PATH,
  QUERY_WASM_CONTRACT_SMART_PATH,
} from "./paths";

/**
 * Answers the well-known bank and wasm stargate paths from the host's native
 * queries and hands everything else to an optional nested module.
 */
export class UnifiedStargate implements StargateModule {
  private readonly log: ILogger;

  constructor(
    readonly extra?: StargateModule,
    logger?: ILogger,
  ) {
    this.log = moduleLogger("unified-stargate", logger);
  }

  static withoutExtra(logger?: ILogger): UnifiedStargate {
    return new UnifiedStargate(undefined, logger);
  }

  static withExtra(extra: StargateModule, logger?: ILogger): UnifiedStargate {
    return new UnifiedStargate(extra, logger);
  }

  execute(
    api: Api,
    storage: Storage,
    router: CosmosRouter,
    block: BlockInfo,
    sender: Addr,
    msg: StargateMsg,
  ): AppResponse {
    if (this.extra) return this.extra.execute(api, storage, router, block, sender, msg);
    throw new UnsupportedError(`No stargate exec handler for ${msg.typeUrl}`, {
      typeUrl: msg.typeUrl,
    });
  }

  sudo(api: Api, storage: Storage, router: CosmosRouter, block: BlockInfo, msg: Empty): AppResponse {
    return this.extra ? this.extra.sudo(api, storage, router, block, msg) : emptyResponse();
  }

  query(
    api: Api,
    storage: ReadonlyStorage,
    querier: Querier,
    block: BlockInfo,
    request: StargateQuery,
  ): Uint8Array {
    const { path, data } = request;
    switch (path) {
      case QUERY_ALL_BALANCES_PATH: {
        const req = queryAllBalancesRequest.decode(data);
        const res = queryAs(
          querier,
          { type: "bank", query: { type: "allBalances", address: req.address } },
          "AllBalanceResponse",
          allBalanceResponseSchema,
        );
        this.log.debug({ path, address: req.address }, "bridged bank query");
        return toJsonBinary({ balances: res.amount, pagination: null });
      }

      case QUERY_BALANCE_PATH: {
        const req = queryBalanceRequest.decode(data);
        const res = queryAs(
          querier,
          { type: "bank", query: { type: "balance", address: req.address, denom: req.denom } },
          "BalanceResponse",
          balanceResponseSchema,
        );
        this.log.debug({ path, address: req.address, denom: req.denom }, "bridged bank query");
        return toJsonBinary({ balance: res.amount });
      }

      case QUERY_SUPPLY_PATH: {
        const req = querySupplyOfRequest.decode(data);
        const res = queryAs(
          querier,
          { type: "bank", query: { type: "supply", denom: req.denom } },
          "SupplyResponse",
          supplyResponseSchema,
        );
        this.log.debug({ path, denom: req.denom }, "bridged bank query");
        return toJsonBinary({ amount: res.amount });
      }

      case QUERY_WASM_CONTRACT_SMART_PATH: {
        const req = querySmartContractStateRequest.decode(data);
        // Raw result: a contract error must reach the caller with its own message.
        const answer = rawQueryUnwrap(querier, {
          type: "wasm",
          query: { type: "smart", contractAddr: req.address, msg: req.queryData },
        });
        this.log.debug({ path, contract: req.address }, "bridged smart query");
        return toJsonBinary({ data: toBase64(answer) });
      }

      case QUERY_WASM_CONTRACT_INFO_PATH: {
        const req = queryContractInfoRequest.decode(data);
        const info = queryAs(
          querier,
          { type: "wasm", query: { type: "contractInfo", contractAddr: req.address } },
          "ContractInfoResponse",
          contractInfoResponseSchema,
        );
        return toJsonBinary({
          address: req.address,
          contract_info: {
            code_id: info.code_id,
            creator: info.creator,
            admin: info.admin ?? "",
            label: "",
            created: null,
            ibc_port_id: info.ibc_port ?? "",
            extension: null,
          },
        });
      }

      default:
        if (this.extra) return this.extra.query(api, storage, querier, block, request);
        throw new UnsupportedError(`Unexpected stargate query: path=${path}, data=${hexData(data)}`, {
          path,
        });
    }
  }
}
