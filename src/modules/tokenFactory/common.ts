import { fromJsonBinary } from "../../codec/json";
import type { TokenFactoryConfig, ChainVariant } from "../../config";
import { supplyResponseSchema } from "../../core/querier";
import type { Api, AppResponse, BlockInfo, Coin, CosmosRouter, StargateModule, Storage } from "../../core/types";
import { UnauthorizedError, ValidationError } from "../../errors";
import type { Addr } from "../../types/brands";
import { coinFromSdkString } from "./denom";

/** A stargate module that issues tokens for one chain flavour. */
export interface TokenFactory extends StargateModule {
  readonly variant: ChainVariant;
  readonly config: TokenFactoryConfig;
}

/** Host services a handler reaches through; bundled so handlers take one argument. */
export type HandlerCtx = {
  api: Api;
  storage: Storage;
  router: CosmosRouter;
  block: BlockInfo;
  sender: Addr;
};

export const checkNewDenomParts = (
  cfg: TokenFactoryConfig,
  subdenom: string,
  creator: string,
  sender: Addr,
): void => {
  if (subdenom.length > cfg.maxSubdenomLen) {
    throw new ValidationError(`Subdenom length is too long, max length is ${cfg.maxSubdenomLen}`);
  }
  if (creator.length > cfg.maxCreatorLen) {
    throw new ValidationError(`Creator length is too long, max length is ${cfg.maxCreatorLen}`);
  }
  if (creator.includes("/")) {
    throw new ValidationError("Invalid creator address, creator address cannot contains '/'");
  }
  if (creator !== sender) {
    throw new UnauthorizedError(
      "Invalid creator address, creator address must be the same as the sender",
    );
  }
};

export const querySupply = (ctx: HandlerCtx, denom: string): bigint => {
  const raw = ctx.router.query(ctx.api, ctx.storage, ctx.block, {
    type: "bank",
    query: { type: "supply", denom },
  });
  return BigInt(fromJsonBinary("SupplyResponse", raw, supplyResponseSchema).amount.amount);
};

export const ensureNoSupply = (ctx: HandlerCtx, denom: string): void => {
  if (querySupply(ctx, denom) !== 0n) throw new ValidationError("Subdenom already exists", { denom });
};

/** Burns the configured creation fee from the sender; the bank's error propagates as is. */
export const chargeCreationFee = (ctx: HandlerCtx, cfg: TokenFactoryConfig, variant: ChainVariant): AppResponse => {
  const fee = coinFromSdkString(cfg.denomCreationFee, variant);
  return ctx.router.execute(ctx.api, ctx.storage, ctx.block, ctx.sender, {
    type: "bank",
    msg: { type: "burn", amount: [fee] },
  });
};

export const bankMint = (ctx: HandlerCtx, toAddress: string, coin: Coin): AppResponse =>
  ctx.router.sudo(ctx.api, ctx.storage, ctx.block, {
    type: "bank",
    msg: { type: "mint", toAddress, amount: [coin] },
  });

export const bankBurn = (ctx: HandlerCtx, coin: Coin): AppResponse =>
  ctx.router.execute(ctx.api, ctx.storage, ctx.block, ctx.sender, {
    type: "bank",
    msg: { type: "burn", amount: [coin] },
  });
