import { toString } from "uint8arrays";
import { UnsupportedError } from "../errors";
import { emptyResponse } from "../core/types";
import type {
  Api,
  AppResponse,
  BlockInfo,
  CosmosRouter,
  Querier,
  ReadonlyStorage,
  StargateModule,
  StargateMsg,
  StargateQuery,
  Storage,
} from "../core/types";
import type { Addr } from "../types/brands";

export const hexData = (data: Uint8Array): string => toString(data, "base16");

/** Default nested module of the query bridge: every message and query is rejected. */
export class StargateFailingModule implements StargateModule {
  execute(
    _api: Api,
    _storage: Storage,
    _router: CosmosRouter,
    _block: BlockInfo,
    _sender: Addr,
    msg: StargateMsg,
  ): AppResponse {
    throw new UnsupportedError(
      `Unexpected stargate execute: type=${msg.typeUrl}, value=${hexData(msg.value)}`,
      { typeUrl: msg.typeUrl },
    );
  }

  query(
    _api: Api,
    _storage: ReadonlyStorage,
    _querier: Querier,
    _block: BlockInfo,
    request: StargateQuery,
  ): Uint8Array {
    throw new UnsupportedError(
      `Unexpected stargate query: path=${request.path}, data=${hexData(request.data)}`,
      { path: request.path },
    );
  }

  sudo(): AppResponse {
    return emptyResponse();
  }
}
