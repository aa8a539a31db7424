import { bool, defineCodec, FieldReader, list, opt, readU32Item, str, uint } from "./rlp";
import type { Field } from "./rlp";
import { DecodeError } from "../errors";
import type { ProtoCoin } from "../core/types";

/* ── shared sub-messages ─────────────────────────────────── */

export type AnyBlob = { typeUrl: string; value: Uint8Array };

export type PageRequest = {
  key: Uint8Array;
  offset: bigint;
  limit: bigint;
  countTotal: boolean;
  reverse: boolean;
};

const coinFields = (c: ProtoCoin) => [str(c.denom), str(c.amount)];
const readCoin = (r: FieldReader): ProtoCoin => ({
  denom: r.string("denom"),
  amount: r.string("amount"),
});

const anyFields = (a: AnyBlob) => [str(a.typeUrl), a.value];
const readAny = (r: FieldReader): AnyBlob => ({
  typeUrl: r.string("type_url"),
  value: r.bytes("value"),
});

export const pageFields = (p: PageRequest) => [
  p.key,
  uint(p.offset),
  uint(p.limit),
  bool(p.countTotal),
  bool(p.reverse),
];
export const readPage = (r: FieldReader): PageRequest => ({
  key: r.bytes("key"),
  offset: r.bigint("offset"),
  limit: r.bigint("limit"),
  countTotal: r.bool("count_total"),
  reverse: r.bool("reverse"),
});

/* ── osmosis token factory ───────────────────────────────── */

export const OSMOSIS_MSG_CREATE_DENOM = "/osmosis.tokenfactory.v1beta1.MsgCreateDenom";
export const OSMOSIS_MSG_MINT = "/osmosis.tokenfactory.v1beta1.MsgMint";
export const OSMOSIS_MSG_BURN = "/osmosis.tokenfactory.v1beta1.MsgBurn";

export type MsgCreateDenom = { sender: string; subdenom: string };
export type MsgCreateDenomResponse = { newTokenDenom: string };
export type MsgTfMint = { sender: string; amount?: ProtoCoin; mintToAddress: string };
export type MsgTfBurn = { sender: string; amount?: ProtoCoin; burnFromAddress: string };

export const msgCreateDenom = defineCodec<MsgCreateDenom>(
  "MsgCreateDenom",
  (m) => [str(m.sender), str(m.subdenom)],
  (r) => ({ sender: r.string("sender"), subdenom: r.string("subdenom") }),
);

export const msgCreateDenomResponse = defineCodec<MsgCreateDenomResponse>(
  "MsgCreateDenomResponse",
  (m) => [str(m.newTokenDenom)],
  (r) => ({ newTokenDenom: r.string("new_token_denom") }),
);

export const msgTfMint = defineCodec<MsgTfMint>(
  "MsgMint",
  (m) => [str(m.sender), opt(m.amount, coinFields), str(m.mintToAddress)],
  (r) => ({
    sender: r.string("sender"),
    amount: r.optional("amount", readCoin),
    mintToAddress: r.string("mint_to_address"),
  }),
);

export const msgTfBurn = defineCodec<MsgTfBurn>(
  "MsgBurn",
  (m) => [str(m.sender), opt(m.amount, coinFields), str(m.burnFromAddress)],
  (r) => ({
    sender: r.string("sender"),
    amount: r.optional("amount", readCoin),
    burnFromAddress: r.string("burn_from_address"),
  }),
);

/* ── coreum asset/ft ─────────────────────────────────────── */

export const COREUM_MSG_ISSUE = "/coreum.asset.ft.v1.MsgIssue";
export const COREUM_MSG_MINT = "/coreum.asset.ft.v1.MsgMint";
export const COREUM_MSG_BURN = "/coreum.asset.ft.v1.MsgBurn";

export type MsgIssue = {
  issuer: string;
  symbol: string;
  subunit: string;
  precision: number;
  initialAmount: string;
  description: string;
  features: number[];
  burnRate: string;
  sendCommissionRate: string;
  uri: string;
  uriHash: string;
};

export type MsgFtMint = { sender: string; coin?: ProtoCoin; recipient: string };
export type MsgFtBurn = { sender: string; coin?: ProtoCoin };

/** Zero-valued issue message for tests and harnesses to spread over. */
export const emptyMsgIssue = (): MsgIssue => ({
  issuer: "",
  symbol: "",
  subunit: "",
  precision: 0,
  initialAmount: "",
  description: "",
  features: [],
  burnRate: "",
  sendCommissionRate: "",
  uri: "",
  uriHash: "",
});

export const msgIssue = defineCodec<MsgIssue>(
  "MsgIssue",
  (m) => [
    str(m.issuer),
    str(m.symbol),
    str(m.subunit),
    uint(m.precision),
    str(m.initialAmount),
    str(m.description),
    list(m.features, uint),
    str(m.burnRate),
    str(m.sendCommissionRate),
    str(m.uri),
    str(m.uriHash),
  ],
  (r) => ({
    issuer: r.string("issuer"),
    symbol: r.string("symbol"),
    subunit: r.string("subunit"),
    precision: r.u32("precision"),
    initialAmount: r.string("initial_amount"),
    description: r.string("description"),
    features: r.repeated("features", readU32Item),
    burnRate: r.string("burn_rate"),
    sendCommissionRate: r.string("send_commission_rate"),
    uri: r.string("uri"),
    uriHash: r.string("uri_hash"),
  }),
);

export const msgFtMint = defineCodec<MsgFtMint>(
  "MsgMint",
  (m) => [str(m.sender), opt(m.coin, coinFields), str(m.recipient)],
  (r) => ({
    sender: r.string("sender"),
    coin: r.optional("coin", readCoin),
    recipient: r.string("recipient"),
  }),
);

export const msgFtBurn = defineCodec<MsgFtBurn>(
  "MsgBurn",
  (m) => [str(m.sender), opt(m.coin, coinFields)],
  (r) => ({ sender: r.string("sender"), coin: r.optional("coin", readCoin) }),
);

/* ── coreum asset/nft + cosmos nft ───────────────────────── */

export const COREUM_MSG_ISSUE_CLASS = "/coreum.asset.nft.v1.MsgIssueClass";
export const COREUM_MSG_NFT_MINT = "/coreum.asset.nft.v1.MsgMint";
export const COREUM_MSG_NFT_BURN = "/coreum.asset.nft.v1.MsgBurn";
export const COSMOS_MSG_NFT_SEND = "/cosmos.nft.v1beta1.MsgSend";

export enum ClassFeature {
  Burning = 0,
  Freezing = 1,
  Whitelisting = 2,
  DisableSending = 3,
  Soulbound = 4,
}

export type MsgIssueClass = {
  issuer: string;
  symbol: string;
  name: string;
  description: string;
  uri: string;
  uriHash: string;
  data?: AnyBlob;
  features: ClassFeature[];
  royaltyRate: string;
};

export type MsgNftMint = {
  sender: string;
  classId: string;
  id: string;
  uri: string;
  uriHash: string;
  data?: AnyBlob;
  recipient: string;
};

export type MsgNftBurn = { sender: string; classId: string; id: string };
export type MsgNftSend = { classId: string; id: string; sender: string; receiver: string };

export const CLASS_FEATURES: readonly ClassFeature[] = [
  ClassFeature.Burning,
  ClassFeature.Freezing,
  ClassFeature.Whitelisting,
  ClassFeature.DisableSending,
  ClassFeature.Soulbound,
];

const readFeature = (f: Field, typeName: string): ClassFeature => {
  const n = readU32Item(f, typeName);
  const feature = CLASS_FEATURES.find((x) => x === n);
  if (feature === undefined) throw new DecodeError(typeName, `unknown class feature ${n}`);
  return feature;
};

export const msgIssueClass = defineCodec<MsgIssueClass>(
  "MsgIssueClass",
  (m) => [
    str(m.issuer),
    str(m.symbol),
    str(m.name),
    str(m.description),
    str(m.uri),
    str(m.uriHash),
    opt(m.data, anyFields),
    list(m.features, uint),
    str(m.royaltyRate),
  ],
  (r) => ({
    issuer: r.string("issuer"),
    symbol: r.string("symbol"),
    name: r.string("name"),
    description: r.string("description"),
    uri: r.string("uri"),
    uriHash: r.string("uri_hash"),
    data: r.optional("data", readAny),
    features: r.repeated("features", readFeature),
    royaltyRate: r.string("royalty_rate"),
  }),
);

export const msgNftMint = defineCodec<MsgNftMint>(
  "MsgMint (NFT)",
  (m) => [
    str(m.sender),
    str(m.classId),
    str(m.id),
    str(m.uri),
    str(m.uriHash),
    opt(m.data, anyFields),
    str(m.recipient),
  ],
  (r) => ({
    sender: r.string("sender"),
    classId: r.string("class_id"),
    id: r.string("id"),
    uri: r.string("uri"),
    uriHash: r.string("uri_hash"),
    data: r.optional("data", readAny),
    recipient: r.string("recipient"),
  }),
);

export const msgNftBurn = defineCodec<MsgNftBurn>(
  "MsgBurn (NFT)",
  (m) => [str(m.sender), str(m.classId), str(m.id)],
  (r) => ({ sender: r.string("sender"), classId: r.string("class_id"), id: r.string("id") }),
);

export const msgNftSend = defineCodec<MsgNftSend>(
  "MsgSend (NFT)",
  (m) => [str(m.classId), str(m.id), str(m.sender), str(m.receiver)],
  (r) => ({
    classId: r.string("class_id"),
    id: r.string("id"),
    sender: r.string("sender"),
    receiver: r.string("receiver"),
  }),
);
