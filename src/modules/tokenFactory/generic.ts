import * as v from "valibot";
import {
  msgCreateDenom,
  msgCreateDenomResponse,
  msgTfBurn,
  msgTfMint,
  OSMOSIS_MSG_BURN,
  OSMOSIS_MSG_CREATE_DENOM,
  OSMOSIS_MSG_MINT,
} from "../../codec/messages";
import type { MsgCreateDenom, MsgTfBurn, MsgTfMint } from "../../codec/messages";
import { resolveTokenFactoryConfig } from "../../config";
import type { TokenFactoryConfig } from "../../config";
import { RecordMap, stringKey } from "../../core/storage";
import { emptyResponse, event } from "../../core/types";
import type {
  Api,
  AppResponse,
  BlockInfo,
  CosmosRouter,
  Querier,
  ReadonlyStorage,
  StargateMsg,
  StargateQuery,
  Storage,
} from "../../core/types";
import { NotFoundError, UnauthorizedError, UnsupportedError, ValidationError } from "../../errors";
import { moduleLogger } from "../../logging";
import type { ILogger } from "../../logging";
import type { Addr } from "../../types/brands";
import { hexData } from "../failing";
import {
  bankBurn,
  bankMint,
  chargeCreationFee,
  checkNewDenomParts,
  ensureNoSupply,
} from "./common";
import type { HandlerCtx, TokenFactory } from "./common";
import { parseU128 } from "./denom";

const createdDenomSchema = v.object({ creator: v.string(), subdenom: v.string() });

/** Full denom -> who created it. */
export const CREATED_DENOMS = new RecordMap("tokenfactory/created_denoms", stringKey, createdDenomSchema);

/** Osmosis-style `factory/<creator>/<subdenom>` token factory. */
export class GenericTokenFactory implements TokenFactory {
  readonly variant = "generic";
  readonly config: TokenFactoryConfig;
  private readonly log: ILogger;

  constructor(overrides: Partial<TokenFactoryConfig> = {}, logger?: ILogger) {
    this.config = resolveTokenFactoryConfig("generic", overrides);
    this.log = moduleLogger("token-factory", logger);
  }

  private createDenom(ctx: HandlerCtx, msg: MsgCreateDenom): AppResponse {
    checkNewDenomParts(this.config, msg.subdenom, msg.sender, ctx.sender);

    const denom = `${this.config.moduleDenomPrefix}/${msg.sender}/${msg.subdenom}`;
    ensureNoSupply(ctx, denom);
    chargeCreationFee(ctx, this.config, this.variant);
    CREATED_DENOMS.save(ctx.storage, denom, { creator: msg.sender, subdenom: msg.subdenom });

    this.log.debug({ denom, creator: msg.sender }, "created denom");
    return {
      events: [event("create_denom", ["creator", msg.sender], ["new_token_denom", denom])],
      data: msgCreateDenomResponse.encode({ newTokenDenom: denom }),
    };
  }

  /**
   * Identity checks shared by mint and burn. The denom-shape test only fails
   * when both the part count and the prefix are wrong; see DESIGN.md.
   */
  private authorize(ctx: HandlerCtx, denom: string, msgSender: string, action: "mint" | "burn"): void {
    const parts = denom.split("/");
    if (parts.length !== 3 && parts[0] !== this.config.moduleDenomPrefix) {
      throw new ValidationError("Invalid denom", { denom });
    }
    if (parts[1] !== ctx.sender) {
      throw new UnauthorizedError(`Unauthorized ${action}. Not the creator of the denom.`, { denom });
    }
    if (ctx.sender !== msgSender) {
      throw new UnauthorizedError("Invalid sender. Sender in msg must be same as sender of transaction.");
    }
  }

  private mint(ctx: HandlerCtx, msg: MsgTfMint): AppResponse {
    if (!msg.amount) throw new ValidationError("missing amount");
    const { denom } = msg.amount;
    this.authorize(ctx, denom, msg.sender, "mint");

    if (!CREATED_DENOMS.has(ctx.storage, denom)) {
      throw new NotFoundError(`Mint for unknown token factory denom \`${denom}\``, { denom });
    }
    const amount = parseU128(msg.amount.amount, "amount");
    if (amount === 0n) throw new ValidationError("Invalid zero amount");

    const recipient = msg.mintToAddress === "" ? msg.sender : msg.mintToAddress;
    bankMint(ctx, recipient, { denom, amount });

    this.log.debug({ denom, amount: amount.toString(), recipient }, "minted");
    return {
      events: [
        event(
          "tf_mint",
          ["sender", msg.sender],
          ["mint_to_address", msg.mintToAddress],
          ["recipient", recipient],
          ["denom", denom],
          ["amount", amount.toString()],
        ),
      ],
      data: new Uint8Array(),
    };
  }

  private burn(ctx: HandlerCtx, msg: MsgTfBurn): AppResponse {
    if (!msg.amount) throw new ValidationError("missing amount");
    const { denom } = msg.amount;
    this.authorize(ctx, denom, msg.sender, "burn");

    const amount = parseU128(msg.amount.amount, "amount");
    if (amount === 0n) throw new ValidationError("Invalid zero amount");

    bankBurn(ctx, { denom, amount });

    this.log.debug({ denom, amount: amount.toString() }, "burned");
    return {
      events: [event("tf_burn", ["burn_from_address", ctx.sender], ["amount", amount.toString()])],
      data: new Uint8Array(),
    };
  }

  execute(
    api: Api,
    storage: Storage,
    router: CosmosRouter,
    block: BlockInfo,
    sender: Addr,
    msg: StargateMsg,
  ): AppResponse {
    const ctx: HandlerCtx = { api, storage, router, block, sender };
    switch (msg.typeUrl) {
      case OSMOSIS_MSG_CREATE_DENOM:
        return this.createDenom(ctx, msgCreateDenom.decode(msg.value));
      case OSMOSIS_MSG_MINT:
        return this.mint(ctx, msgTfMint.decode(msg.value));
      case OSMOSIS_MSG_BURN:
        return this.burn(ctx, msgTfBurn.decode(msg.value));
      default:
        throw new UnsupportedError(`Unknown message type ${msg.typeUrl}`, { typeUrl: msg.typeUrl });
    }
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
