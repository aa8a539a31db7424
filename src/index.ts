export * from "./errors";
export * from "./config";
export { makeLogger, moduleLogger, rootLogger } from "./logging";
export type { ILogger } from "./logging";
export * from "./types/brands";
export * from "./core/types";
export { MemoryStorage, RecordMap, pairKey, stringKey } from "./core/storage";
export type { KeyCodec } from "./core/storage";
export { queryAs, rawQueryUnwrap } from "./core/querier";
export * from "./codec/messages";
export * from "./codec/queries";
export { fromBase64, fromJsonBinary, toBase64, toJsonBinary } from "./codec/json";
export type { Codec } from "./codec/rlp";
export * from "./modules/paths";
export { StargateFailingModule } from "./modules/failing";
export { UnifiedStargate } from "./modules/unifiedStargate";
export { CoreumQueryModule } from "./modules/coreumQuery";
export {
  CoreumTokenFactory,
  GenericTokenFactory,
  coinFromSdkString,
  createTokenFactory,
} from "./modules/tokenFactory";
export type { TokenFactory } from "./modules/tokenFactory";
export { App, AppBuilder, DEFAULT_BLOCK } from "./app/app";
export type { ContractQueryHandler, MockContract } from "./app/app";
export { BankKeeper } from "./app/bank";
export { MockApi } from "./app/api";
