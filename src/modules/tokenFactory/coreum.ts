import { toJsonBinary } from "../../codec/json";
import {
  ClassFeature,
  COREUM_MSG_BURN,
  COREUM_MSG_ISSUE,
  COREUM_MSG_ISSUE_CLASS,
  COREUM_MSG_MINT,
  COREUM_MSG_NFT_BURN,
  COREUM_MSG_NFT_MINT,
  COSMOS_MSG_NFT_SEND,
  msgFtBurn,
  msgFtMint,
  msgIssue,
  msgIssueClass,
  msgNftBurn,
  msgNftMint,
  msgNftSend,
} from "../../codec/messages";
import type {
  MsgFtBurn,
  MsgFtMint,
  MsgIssue,
  MsgIssueClass,
  MsgNftBurn,
  MsgNftMint,
  MsgNftSend,
} from "../../codec/messages";
import {
  queryClassesRequest,
  queryClassRequest,
  queryNftRequest,
  queryNftsRequest,
  queryOwnerRequest,
  queryTokenRequest,
  queryTokensRequest,
} from "../../codec/queries";
import { resolveTokenFactoryConfig } from "../../config";
import type { TokenFactoryConfig } from "../../config";
import { emptyResponse, event } from "../../core/types";
import type {
  Api,
  AppResponse,
  BlockInfo,
  CosmosRouter,
  Event,
  Querier,
  ReadonlyStorage,
  StargateMsg,
  StargateQuery,
  Storage,
} from "../../core/types";
import {
  NotFoundError,
  UnauthorizedError,
  UnsupportedError,
  ValidationError,
} from "../../errors";
import { moduleLogger } from "../../logging";
import type { ILogger } from "../../logging";
import type { Addr } from "../../types/brands";
import {
  COREUM_QUERY_CLASS_PATH,
  COREUM_QUERY_CLASSES_PATH,
  COREUM_QUERY_TOKEN_PATH,
  COREUM_QUERY_TOKENS_PATH,
  NFT_QUERY_NFT_PATH,
  NFT_QUERY_NFTS_PATH,
  NFT_QUERY_OWNER_PATH,
} from "../paths";
import { bankBurn, bankMint, chargeCreationFee, checkNewDenomParts, ensureNoSupply } from "./common";
import type { HandlerCtx, TokenFactory } from "./common";
import {
  classIdFor,
  classJson,
  EMPTY_PAGE,
  ISSUED_NFT_CLASSES,
  ISSUED_TOKENS,
  issueToDenom,
  listClasses,
  listNfts,
  listTokens,
  loadClass,
  loadNft,
  loadToken,
  MINTED_NFTS,
  newStoredNft,
  nftJson,
  toStoredClass,
} from "./coreumState";
import type { StoredClass, StoredNft } from "./coreumState";
import { parseU128 } from "./denom";

const ASSET_NAME = /^[a-zA-Z][a-zA-Z0-9/:._-]{2,127}$/;

const checkAssetName = (field: "subunit" | "symbol", value: string): void => {
  if (!ASSET_NAME.test(value)) {
    throw new ValidationError(
      `${field} must match regex format '^[a-zA-Z][a-zA-Z0-9/:._-]{2,127}$': invalid input`,
      { [field]: value },
    );
  }
};

/** `<subunit>-<issuer>` split; anything but exactly two parts is rejected. */
const denomIssuer = (denom: string): string => {
  const parts = denom.split("-");
  if (parts.length !== 2) throw new ValidationError("Invalid denom", { denom });
  return parts[1];
};

/**
 * Coreum asset/ft and asset/nft messages, plus the cosmos nft send.
 * Fungible denoms are `<subunit>-<issuer>`; NFT classes are `<symbol>-<issuer>`.
 */
export class CoreumTokenFactory implements TokenFactory {
  readonly variant = "coreum";
  readonly config: TokenFactoryConfig;
  private readonly log: ILogger;

  constructor(overrides: Partial<TokenFactoryConfig> = {}, logger?: ILogger) {
    this.config = resolveTokenFactoryConfig("coreum", overrides);
    this.log = moduleLogger("coreum-token-factory", logger);
  }

  /* ── fungible tokens ───────────────────────────────────── */

  private issue(ctx: HandlerCtx, msg: MsgIssue): AppResponse {
    checkNewDenomParts(this.config, msg.subunit, msg.issuer, ctx.sender);
    checkAssetName("subunit", msg.subunit);
    checkAssetName("symbol", msg.symbol);

    const denom = issueToDenom(msg);
    ensureNoSupply(ctx, denom);
    chargeCreationFee(ctx, this.config, this.variant);

    const events: Event[] = [];
    if (msg.initialAmount !== "") {
      const amount = parseU128(msg.initialAmount, "initial_amount");
      if (amount > 0n) events.push(...bankMint(ctx, msg.issuer, { denom, amount }).events);
    }

    ISSUED_TOKENS.save(ctx.storage, denom, msg);
    this.log.debug({ denom, issuer: msg.issuer }, "issued fungible token");

    events.push(event("/coreum.asset.ft.v1.EventIssued", ["denom", denom], ["issuer", msg.issuer]));
    return { events };
  }

  private mint(ctx: HandlerCtx, msg: MsgFtMint): AppResponse {
    if (!msg.coin) throw new ValidationError("MsgMint.coin is None");
    const { denom } = msg.coin;

    if (denomIssuer(denom) !== ctx.sender) {
      throw new UnauthorizedError("Unauthorized mint. Not the issuer of the denom.", { denom });
    }
    if (ctx.sender !== msg.sender) {
      throw new UnauthorizedError("Invalid sender. Sender in msg must be same as sender of transaction.");
    }
    if (!ISSUED_TOKENS.has(ctx.storage, denom)) {
      throw new NotFoundError(`MsgMint for unknown Coreum FT denom \`${denom}\``, { denom });
    }
    const amount = parseU128(msg.coin.amount, "amount");
    if (amount === 0n) throw new ValidationError("Invalid zero amount");

    const recipient = msg.recipient === "" ? msg.sender : msg.recipient;
    const res = bankMint(ctx, recipient, { denom, amount });

    this.log.debug({ denom, amount: amount.toString(), recipient }, "minted fungible token");
    return {
      events: [
        ...res.events,
        event(
          "tf_mint",
          ["sender", msg.sender],
          ["recipient", recipient],
          ["denom", denom],
          ["amount", amount.toString()],
        ),
      ],
    };
  }

  private burn(ctx: HandlerCtx, msg: MsgFtBurn): AppResponse {
    if (!msg.coin) throw new ValidationError("MsgBurn.coin is None");
    const { denom } = msg.coin;

    if (denomIssuer(denom) !== ctx.sender) {
      throw new UnauthorizedError("Unauthorized burn. Not the issuer of the denom.", { denom });
    }
    if (ctx.sender !== msg.sender) {
      throw new UnauthorizedError("Invalid sender. Sender in msg must be same as sender of transaction.");
    }
    if (!ISSUED_TOKENS.has(ctx.storage, denom)) {
      throw new NotFoundError(`MsgBurn for unknown Coreum FT denom \`${denom}\``, { denom });
    }
    const amount = parseU128(msg.coin.amount, "amount");
    if (amount === 0n) throw new ValidationError("Invalid zero amount");

    const res = bankBurn(ctx, { denom, amount });

    this.log.debug({ denom, amount: amount.toString() }, "burned fungible token");
    return {
      events: [
        ...res.events,
        event("tf_burn", ["burn_from_address", ctx.sender], ["amount", amount.toString()]),
      ],
    };
  }

  /* ── NFTs ──────────────────────────────────────────────── */

  private issueClass(ctx: HandlerCtx, msg: MsgIssueClass): AppResponse {
    if (msg.issuer !== ctx.sender) {
      throw new UnauthorizedError("Invalid issuer. issuer in msg must match sender.");
    }
    const classId = classIdFor(msg.symbol, msg.issuer);
    if (ISSUED_NFT_CLASSES.has(ctx.storage, classId)) {
      throw new ValidationError(`NFT class already exists: ${classId}`, { classId });
    }
    ISSUED_NFT_CLASSES.save(ctx.storage, classId, toStoredClass(msg));

    this.log.debug({ classId, issuer: msg.issuer }, "issued NFT class");
    return {
      events: [
        event("/coreum.asset.nft.v1.EventClassIssued", ["class_id", classId], ["issuer", msg.issuer]),
      ],
    };
  }

  private nftMint(ctx: HandlerCtx, msg: MsgNftMint): AppResponse {
    if (msg.sender !== ctx.sender) {
      throw new UnauthorizedError("Invalid sender. sender in msg must match tx sender.");
    }
    const { classId, id } = msg;
    const cls = ISSUED_NFT_CLASSES.mayLoad(ctx.storage, classId);
    if (!cls) throw new NotFoundError(`MsgMint for unknown Coreum NFT class \`${classId}\``, { classId });
    if (cls.issuer !== ctx.sender) {
      throw new UnauthorizedError(`Unauthorized mint. Not the issuer of class \`${classId}\``, { classId });
    }
    if (MINTED_NFTS.has(ctx.storage, [classId, id])) {
      throw new ValidationError(`NFT already minted: ${classId}/${id}`, { classId, id });
    }

    const owner = msg.recipient === "" ? msg.sender : msg.recipient;
    MINTED_NFTS.save(ctx.storage, [classId, id], newStoredNft(classId, id, owner, msg.uri, msg.data));

    this.log.debug({ classId, id, owner }, "minted NFT");
    return {
      events: [event("/coreum.asset.nft.v1.EventMinted", ["class_id", classId], ["id", id], ["owner", owner])],
    };
  }

  private loadLive(storage: ReadonlyStorage, classId: string, id: string): [StoredClass, StoredNft] {
    const cls = ISSUED_NFT_CLASSES.mayLoad(storage, classId);
    if (!cls) throw new NotFoundError(`Class id not found: ${classId}`, { classId });
    const nft = MINTED_NFTS.mayLoad(storage, [classId, id]);
    if (!nft) throw new NotFoundError(`NFT not found: ${classId}/${id}`, { classId, id });
    return [cls, nft];
  }

  private nftBurn(ctx: HandlerCtx, msg: MsgNftBurn): AppResponse {
    if (msg.sender !== ctx.sender) {
      throw new UnauthorizedError("Invalid sender. sender in msg must match tx sender.");
    }
    const { classId, id } = msg;
    const [cls, nft] = this.loadLive(ctx.storage, classId, id);

    const issuerMayBurn = cls.features.includes(ClassFeature.Burning) && cls.issuer === ctx.sender;
    this.log.debug({ classId, id, owner: nft.owner, sender: ctx.sender, issuerMayBurn }, "burning NFT");
    if (nft.owner !== ctx.sender && !issuerMayBurn) {
      throw new UnauthorizedError(`Unauthorized burn. Only owner or issuer can burn ${classId}/${id}`, {
        classId,
        id,
      });
    }

    MINTED_NFTS.remove(ctx.storage, [classId, id]);
    return {
      events: [
        event("/coreum.asset.nft.v1.EventBurned", ["class_id", classId], ["id", id], ["owner", ctx.sender]),
      ],
    };
  }

  private nftSend(ctx: HandlerCtx, msg: MsgNftSend): AppResponse {
    const { classId, id } = msg;
    const [cls, nft] = this.loadLive(ctx.storage, classId, id);

    if (cls.features.includes(ClassFeature.Soulbound)) {
      // Custodial override: the issuer moves soulbound tokens, nobody else does.
      if (cls.issuer !== ctx.sender) {
        throw new UnauthorizedError(`Unauthorized send. Only issuer can send soulbound ${classId}/${id}`, {
          classId,
          id,
        });
      }
    } else {
      if (msg.sender !== ctx.sender) {
        throw new UnauthorizedError("Invalid sender. sender in msg must match tx sender.");
      }
      if (nft.owner !== ctx.sender) {
        throw new UnauthorizedError(`Unauthorized send. Only owner can send ${classId}/${id}`, {
          classId,
          id,
        });
      }
    }
    if (msg.receiver === "") throw new ValidationError("MsgSend.receiver is empty");

    MINTED_NFTS.save(ctx.storage, [classId, id], { ...nft, owner: msg.receiver });

    this.log.debug({ classId, id, from: nft.owner, to: msg.receiver }, "sent NFT");
    return {
      events: [
        event(
          "/coreum.asset.nft.v1.EventSent",
          ["class_id", classId],
          ["id", id],
          ["sender", msg.sender],
          ["receiver", msg.receiver],
        ),
      ],
    };
  }

  private handleAny(ctx: HandlerCtx, typeUrl: string, value: Uint8Array): AppResponse {
    switch (typeUrl) {
      case COREUM_MSG_ISSUE:
        return this.issue(ctx, msgIssue.decode(value));
      case COREUM_MSG_MINT:
        return this.mint(ctx, msgFtMint.decode(value));
      case COREUM_MSG_BURN:
        return this.burn(ctx, msgFtBurn.decode(value));
      case COREUM_MSG_ISSUE_CLASS:
        return this.issueClass(ctx, msgIssueClass.decode(value));
      case COREUM_MSG_NFT_MINT:
        return this.nftMint(ctx, msgNftMint.decode(value));
      case COREUM_MSG_NFT_BURN:
        return this.nftBurn(ctx, msgNftBurn.decode(value));
      case COSMOS_MSG_NFT_SEND:
        return this.nftSend(ctx, msgNftSend.decode(value));
      default:
        throw new UnsupportedError(`Unknown message type ${typeUrl}`, { typeUrl });
    }
  }

  execute(
    api: Api,
    storage: Storage,
    router: CosmosRouter,
    block: BlockInfo,
    sender: Addr,
    msg: StargateMsg,
  ): AppResponse {
    return this.handleAny({ api, storage, router, block, sender }, msg.typeUrl, msg.value);
  }

  query(
    _api: Api,
    storage: ReadonlyStorage,
    _querier: Querier,
    _block: BlockInfo,
    request: StargateQuery,
  ): Uint8Array {
    const { path, data } = request;
    switch (path) {
      case COREUM_QUERY_TOKEN_PATH: {
        const req = queryTokenRequest.decode(data);
        return toJsonBinary({ token: loadToken(storage, req.denom, this.config.feeDenom) });
      }
      case COREUM_QUERY_TOKENS_PATH: {
        const req = queryTokensRequest.decode(data);
        return toJsonBinary({ tokens: listTokens(storage, req.issuer), pagination: EMPTY_PAGE });
      }
      case COREUM_QUERY_CLASS_PATH: {
        const req = queryClassRequest.decode(data);
        return toJsonBinary({ class: classJson(req.id, loadClass(storage, req.id)) });
      }
      case COREUM_QUERY_CLASSES_PATH: {
        const req = queryClassesRequest.decode(data);
        const classes = listClasses(storage, req.issuer).map(([id, c]) => classJson(id, c));
        return toJsonBinary({ classes, pagination: EMPTY_PAGE });
      }
      case NFT_QUERY_NFT_PATH: {
        const req = queryNftRequest.decode(data);
        return toJsonBinary({ nft: nftJson(loadNft(storage, req.classId, req.id)) });
      }
      case NFT_QUERY_NFTS_PATH: {
        const req = queryNftsRequest.decode(data);
        const nfts = listNfts(storage, {
          classId: req.classId === "" ? undefined : req.classId,
          owner: req.owner === "" ? undefined : req.owner,
        });
        return toJsonBinary({ nfts: nfts.map(nftJson), pagination: EMPTY_PAGE });
      }
      case NFT_QUERY_OWNER_PATH: {
        const req = queryOwnerRequest.decode(data);
        return toJsonBinary({ owner: loadNft(storage, req.classId, req.id).owner });
      }
      default:
        throw new UnsupportedError(`Unsupported query path ${path}`, { path });
    }
  }

  sudo(): AppResponse {
    return emptyResponse();
  }
}
