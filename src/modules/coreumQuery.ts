import * as v from "valibot";
import { toJsonBinary } from "../codec/json";
import { COREUM_FEE_DENOM } from "../config";
import { emptyResponse } from "../core/types";
import type {
  Api,
  AppResponse,
  BlockInfo,
  CustomModule,
  Querier,
  ReadonlyStorage,
} from "../core/types";
import { DecodeError, UnsupportedError } from "../errors";
import { moduleLogger } from "../logging";
import type { ILogger } from "../logging";
import {
  classJson,
  EMPTY_PAGE,
  listClasses,
  listNfts,
  listTokens,
  loadClass,
  loadNft,
  loadToken,
  nftJson,
} from "./tokenFactory/coreumState";
import type { TokenFactory } from "./tokenFactory/common";

/* ── request shapes ──────────────────────────────────────── */

// `{ <category>: { <variant>: { ...args } } }`
const envelopeSchema = v.pipe(
  v.record(v.string(), v.record(v.string(), v.unknown())),
  v.check((o) => Object.keys(o).length === 1, "expected exactly one query category"),
);

const inner = v.pipe(
  v.record(v.string(), v.unknown()),
  v.check((o) => Object.keys(o).length === 1, "expected exactly one query variant"),
);

const nftIdArgs = v.object({ class_id: v.string(), id: v.string() });
const nftsArgs = v.object({
  class_id: v.nullish(v.string()),
  owner: v.nullish(v.string()),
  pagination: v.nullish(v.unknown()),
});
const classArgs = v.object({ id: v.string() });
const byIssuerArgs = v.object({ issuer: v.string(), pagination: v.nullish(v.unknown()) });
const tokenArgs = v.object({ denom: v.string() });

const parse = <T>(typeName: string, schema: v.GenericSchema<unknown, T>, input: unknown): T => {
  const res = v.safeParse(schema, input);
  if (!res.success) throw new DecodeError(typeName, res.issues.map((i) => i.message).join("; "));
  return res.output;
};

type Category = "nft" | "asset_nft" | "asset_ft";

const CATEGORY_LABEL: Record<Category, string> = {
  nft: "NFT",
  asset_nft: "AssetNFT",
  asset_ft: "AssetFT",
};

const isCategory = (k: string): k is Category => Object.hasOwn(CATEGORY_LABEL, k);

/**
 * Custom queries a Coreum contract issues, answered from the token factory's
 * records. Only the read paths contracts use are simulated.
 */
export class CoreumQueryModule implements CustomModule {
  private readonly log: ILogger;

  constructor(
    logger?: ILogger,
    private readonly nativeDenom: string = COREUM_FEE_DENOM,
  ) {
    this.log = moduleLogger("coreum-query", logger);
  }

  /** Shares the factory's native fee denom, so both query surfaces agree on the native token. */
  static forFactory(factory: TokenFactory, logger?: ILogger): CoreumQueryModule {
    return new CoreumQueryModule(logger, factory.config.feeDenom);
  }

  execute(): AppResponse {
    throw new UnsupportedError("CoreumQueryModule execute is not implemented");
  }

  sudo(): AppResponse {
    return emptyResponse();
  }

  query(
    _api: Api,
    storage: ReadonlyStorage,
    _querier: Querier,
    _block: BlockInfo,
    request: unknown,
  ): Uint8Array {
    const envelope = parse("CoreumQueries", envelopeSchema, request);
    const [category, body] = Object.entries(envelope)[0];
    if (!isCategory(category)) {
      throw new UnsupportedError(`Coreum query not implemented: ${JSON.stringify(envelope)}`);
    }
    const q = parse(`${CATEGORY_LABEL[category]} query`, inner, body);
    const [variant, args] = Object.entries(q)[0];
    this.log.debug({ category, variant }, "custom query");

    const answer = this.answer(storage, category, variant, args);
    if (answer === undefined) {
      throw new UnsupportedError(
        `Coreum ${CATEGORY_LABEL[category]} query not implemented: ${JSON.stringify(q)}`,
      );
    }
    return toJsonBinary(answer);
  }

  /** `undefined` when the variant exists on chain but is not simulated. */
  private answer(storage: ReadonlyStorage, category: Category, variant: string, args: unknown): unknown {
    switch (`${category}.${variant}`) {
      case "nft.nft": {
        const { class_id, id } = parse("nft.nft", nftIdArgs, args);
        return { nft: nftJson(loadNft(storage, class_id, id)) };
      }
      case "nft.nfts": {
        const { class_id, owner } = parse("nft.nfts", nftsArgs, args);
        const nfts = listNfts(storage, { classId: class_id ?? undefined, owner: owner ?? undefined });
        return { nfts: nfts.map(nftJson), pagination: EMPTY_PAGE };
      }
      case "nft.owner": {
        const { class_id, id } = parse("nft.owner", nftIdArgs, args);
        return { owner: loadNft(storage, class_id, id).owner };
      }
      case "asset_nft.class": {
        const { id } = parse("asset_nft.class", classArgs, args);
        return { class: classJson(id, loadClass(storage, id)) };
      }
      case "asset_nft.classes": {
        const { issuer } = parse("asset_nft.classes", byIssuerArgs, args);
        const classes = listClasses(storage, issuer).map(([id, c]) => classJson(id, c));
        return { classes, pagination: EMPTY_PAGE };
      }
      case "asset_ft.token": {
        const { denom } = parse("asset_ft.token", tokenArgs, args);
        return { token: loadToken(storage, denom, this.nativeDenom) };
      }
      case "asset_ft.tokens": {
        const { issuer } = parse("asset_ft.tokens", byIssuerArgs, args);
        return { tokens: listTokens(storage, issuer), pagination: EMPTY_PAGE };
      }
      default:
        return undefined;
    }
  }
}
