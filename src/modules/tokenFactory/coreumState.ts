// Persisted Coreum asset records and their JSON views.
//
// The token factory writes these maps; the custom query module and the
// factory's own stargate queries read them.

import * as v from "valibot";
import { toBase64 } from "../../codec/json";
import { CLASS_FEATURES } from "../../codec/messages";
import type { AnyBlob, MsgIssue, MsgIssueClass } from "../../codec/messages";
import { pairKey, RecordMap, stringKey } from "../../core/storage";
import type { ReadonlyStorage } from "../../core/types";
import { NotFoundError } from "../../errors";

/* ── stored shapes ───────────────────────────────────────── */

const storedBlobSchema = v.object({ typeUrl: v.string(), value: v.string() });
type StoredBlob = v.InferOutput<typeof storedBlobSchema>;

const issueSchema = v.object({
  issuer: v.string(),
  symbol: v.string(),
  subunit: v.string(),
  precision: v.number(),
  initialAmount: v.string(),
  description: v.string(),
  features: v.array(v.number()),
  burnRate: v.string(),
  sendCommissionRate: v.string(),
  uri: v.string(),
  uriHash: v.string(),
});

const storedClassSchema = v.object({
  issuer: v.string(),
  symbol: v.string(),
  name: v.string(),
  description: v.string(),
  uri: v.string(),
  uriHash: v.string(),
  data: v.nullable(storedBlobSchema),
  features: v.array(v.picklist(CLASS_FEATURES)),
  royaltyRate: v.string(),
});
export type StoredClass = v.InferOutput<typeof storedClassSchema>;

const storedNftSchema = v.object({
  classId: v.string(),
  id: v.string(),
  owner: v.string(),
  uri: v.string(),
  data: v.nullable(storedBlobSchema),
});
export type StoredNft = v.InferOutput<typeof storedNftSchema>;

/** denom -> the issue message that created it */
export const ISSUED_TOKENS = new RecordMap<string, MsgIssue>("coreum_assetft/issued", stringKey, issueSchema);
/** class id -> issued class */
export const ISSUED_NFT_CLASSES = new RecordMap("coreum_assetnft/issued_classes", stringKey, storedClassSchema);
/** (class id, token id) -> live NFT */
export const MINTED_NFTS = new RecordMap("coreum_assetnft/minted", pairKey, storedNftSchema);

const storeBlob = (b: AnyBlob | undefined): StoredBlob | null =>
  b === undefined ? null : { typeUrl: b.typeUrl, value: toBase64(b.value) };

export const toStoredClass = (msg: MsgIssueClass): StoredClass => ({
  issuer: msg.issuer,
  symbol: msg.symbol,
  name: msg.name,
  description: msg.description,
  uri: msg.uri,
  uriHash: msg.uriHash,
  data: storeBlob(msg.data),
  features: msg.features,
  royaltyRate: msg.royaltyRate,
});

export const newStoredNft = (
  classId: string,
  id: string,
  owner: string,
  uri: string,
  data: AnyBlob | undefined,
): StoredNft => ({ classId, id, owner, uri, data: storeBlob(data) });

export const issueToDenom = (msg: MsgIssue): string => `${msg.subunit}-${msg.issuer}`;

export const classIdFor = (symbol: string, issuer: string): string => `${symbol.toLowerCase()}-${issuer}`;

/* ── JSON views ──────────────────────────────────────────── */

export const EMPTY_PAGE = { next_key: null, total: 0 } as const;

export const nftJson = (n: StoredNft) => ({
  class_id: n.classId,
  id: n.id,
  uri: n.uri === "" ? null : n.uri,
  uri_hash: null,
  data: n.data === null ? null : n.data.value,
});

export const classJson = (id: string, c: StoredClass) => ({
  id,
  issuer: c.issuer,
  name: c.name,
  symbol: c.symbol,
  description: c.description,
  uri: c.uri,
  uri_hash: c.uriHash,
  features: c.features,
  data: c.data === null ? null : c.data.value,
  royalty_rate: "0",
});

const tokenView = (
  denom: string,
  issuer: string,
  symbol: string,
  subunit: string,
  precision: number,
  description: string,
) => ({
  denom,
  issuer,
  symbol,
  subunit,
  precision,
  description,
  globally_frozen: false,
  features: [],
  burn_rate: "0",
  send_commission_rate: "0",
  version: 0,
  uri: "",
  uri_hash: "",
  extension_cw_address: null,
  admin: null,
});

export type TokenJson = ReturnType<typeof tokenView>;

export const tokenJson = (denom: string, issue: MsgIssue): TokenJson =>
  tokenView(denom, issue.issuer, issue.symbol, issue.subunit, issue.precision, issue.description);

export const nativeTokenJson = (denom: string): TokenJson =>
  tokenView(denom, "", "CORE", denom, 6, "Native Coreum token");

/* ── readers ─────────────────────────────────────────────── */

export const loadNft = (storage: ReadonlyStorage, classId: string, id: string): StoredNft => {
  const nft = MINTED_NFTS.mayLoad(storage, [classId, id]);
  if (!nft) throw new NotFoundError(`NFT not found for ${classId}/${id}`, { classId, id });
  return nft;
};

export const listNfts = (
  storage: ReadonlyStorage,
  filter: { classId?: string; owner?: string },
): StoredNft[] =>
  MINTED_NFTS.entries(storage)
    .map(([, nft]) => nft)
    .filter(
      (nft) =>
        (filter.classId === undefined || nft.classId === filter.classId) &&
        (filter.owner === undefined || nft.owner === filter.owner),
    );

export const loadClass = (storage: ReadonlyStorage, id: string): StoredClass => {
  const cls = ISSUED_NFT_CLASSES.mayLoad(storage, id);
  if (!cls) throw new NotFoundError(`NFT class not found for id \`${id}\``, { id });
  return cls;
};

/** An empty issuer lists every class. */
export const listClasses = (storage: ReadonlyStorage, issuer: string): [string, StoredClass][] =>
  ISSUED_NFT_CLASSES.entries(storage).filter(([, c]) => issuer === "" || c.issuer === issuer);

export const loadToken = (storage: ReadonlyStorage, denom: string, nativeDenom: string): TokenJson => {
  const issue = ISSUED_TOKENS.mayLoad(storage, denom);
  if (issue) return tokenJson(denom, issue);
  if (denom === nativeDenom) return nativeTokenJson(denom);
  throw new NotFoundError(`FT not found for denom \`${denom}\``, { denom });
};

export const listTokens = (storage: ReadonlyStorage, issuer: string): TokenJson[] =>
  ISSUED_TOKENS.entries(storage)
    .filter(([, issue]) => issuer === "" || issue.issuer === issuer)
    .map(([denom, issue]) => tokenJson(denom, issue));
