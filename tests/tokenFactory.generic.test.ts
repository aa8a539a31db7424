import { describe, it, expect, beforeEach } from "vitest";
import * as rlp from "rlp";
import type { App } from "../src/app/app";
import {
  msgCreateDenom,
  msgCreateDenomResponse,
  msgTfBurn,
  msgTfMint,
  OSMOSIS_MSG_BURN,
  OSMOSIS_MSG_CREATE_DENOM,
  OSMOSIS_MSG_MINT,
} from "../src/codec/messages";
import type { ProtoCoin } from "../src/core/types";
import { asAddr } from "../src/types/brands";
import type { Addr } from "../src/types/brands";
import { ALICE, BOB, CAROL, FEE, genericApp } from "./helpers/app";

const DENOM = "factory/addr_alice/tkn";

const createDenom = (app: App, sender: Addr, subdenom: string, msgSender: string = sender) =>
  app.executeStargate(sender, OSMOSIS_MSG_CREATE_DENOM, msgCreateDenom.encode({ sender: msgSender, subdenom }));

const mint = (app: App, sender: Addr, amount: ProtoCoin | undefined, mintToAddress = "", msgSender: string = sender) =>
  app.executeStargate(sender, OSMOSIS_MSG_MINT, msgTfMint.encode({ sender: msgSender, amount, mintToAddress }));

const burn = (app: App, sender: Addr, amount: ProtoCoin | undefined) =>
  app.executeStargate(sender, OSMOSIS_MSG_BURN, msgTfBurn.encode({ sender, amount, burnFromAddress: "" }));

describe("generic token factory", () => {
  let app: App;

  beforeEach(() => {
    app = genericApp();
  });

  describe("create denom", () => {
    it("derives the denom, charges the fee and reports it", () => {
      const res = createDenom(app, ALICE, "tkn");

      expect(res.events).toEqual([
        {
          type: "create_denom",
          attributes: [
            { key: "creator", value: "addr_alice" },
            { key: "new_token_denom", value: DENOM },
          ],
        },
      ]);
      expect(res.data).toBeDefined();
      if (res.data) expect(msgCreateDenomResponse.decode(res.data)).toEqual({ newTokenDenom: DENOM });
      expect(app.balance(ALICE, "uosmo")).toBe(2n * FEE);
    });

    it("allows re-creating a denom that has no supply", () => {
      createDenom(app, ALICE, "tkn");
      createDenom(app, ALICE, "tkn");
      expect(app.balance(ALICE, "uosmo")).toBe(FEE);
    });

    it("refuses a denom that already has supply", () => {
      createDenom(app, ALICE, "tkn");
      mint(app, ALICE, { denom: DENOM, amount: "1" });
      expect(() => createDenom(app, ALICE, "tkn")).toThrow("Subdenom already exists");
    });

    it("validates lengths and the creator", () => {
      expect(() => createDenom(app, ALICE, "s".repeat(33))).toThrow(
        "Subdenom length is too long, max length is 32",
      );
      expect(() => createDenom(app, asAddr("a".repeat(76)), "tkn")).toThrow(
        "Creator length is too long, max length is 75",
      );
      expect(() => createDenom(app, asAddr("addr/x"), "tkn")).toThrow(
        "Invalid creator address, creator address cannot contains '/'",
      );
      expect(() => createDenom(app, ALICE, "tkn", BOB)).toThrow(
        "Invalid creator address, creator address must be the same as the sender",
      );
    });

    it("fails without the fee and leaves nothing behind", () => {
      expect(() => createDenom(app, CAROL, "tkn")).toThrow("Cannot Sub with 0 and 10000000");
      expect(() => mint(app, CAROL, { denom: "factory/addr_carol/tkn", amount: "1" })).toThrow(
        "Mint for unknown token factory denom `factory/addr_carol/tkn`",
      );
    });

    it("reports malformed payloads", () => {
      expect(() => app.executeStargate(ALICE, OSMOSIS_MSG_CREATE_DENOM, rlp.encode(Uint8Array.of(0x78)))).toThrow(
        "failed to decode MsgCreateDenom: expected an RLP list",
      );
    });
  });

  describe("mint", () => {
    beforeEach(() => {
      createDenom(app, ALICE, "tkn");
    });

    it("mints to the requested address", () => {
      const res = mint(app, ALICE, { denom: DENOM, amount: "100" }, BOB);
      expect(res.events).toEqual([
        {
          type: "tf_mint",
          attributes: [
            { key: "sender", value: "addr_alice" },
            { key: "mint_to_address", value: "addr_bob" },
            { key: "recipient", value: "addr_bob" },
            { key: "denom", value: DENOM },
            { key: "amount", value: "100" },
          ],
        },
      ]);
      expect(app.balance(BOB, DENOM)).toBe(100n);
      expect(app.supply(DENOM)).toBe(100n);
    });

    it("defaults the recipient to the sender", () => {
      const res = mint(app, ALICE, { denom: DENOM, amount: "5" });
      expect(res.events[0].attributes.slice(1, 3)).toEqual([
        { key: "mint_to_address", value: "" },
        { key: "recipient", value: "addr_alice" },
      ]);
      expect(app.balance(ALICE, DENOM)).toBe(5n);
    });

    it("checks the amount and both senders", () => {
      expect(() => mint(app, ALICE, undefined)).toThrow("missing amount");
      expect(() => mint(app, BOB, { denom: DENOM, amount: "1" })).toThrow(
        "Unauthorized mint. Not the creator of the denom.",
      );
      expect(() => mint(app, ALICE, { denom: DENOM, amount: "1" }, "", BOB)).toThrow(
        "Invalid sender. Sender in msg must be same as sender of transaction.",
      );
      expect(() => mint(app, ALICE, { denom: DENOM, amount: "0" })).toThrow("Invalid zero amount");
      expect(() => mint(app, ALICE, { denom: DENOM, amount: "abc" })).toThrow("invalid amount `abc`");
    });

    it("only rejects a denom shape when both part count and prefix are wrong", () => {
      expect(() => mint(app, ALICE, { denom: "uosmo", amount: "1" })).toThrow("Invalid denom");
      // three parts with a foreign prefix pass the shape check
      expect(() => mint(app, ALICE, { denom: "other/addr_alice/tkn", amount: "1" })).toThrow(
        "Mint for unknown token factory denom `other/addr_alice/tkn`",
      );
      expect(() => mint(app, ALICE, { denom: "factory/addr_alice", amount: "1" })).toThrow(
        "Mint for unknown token factory denom `factory/addr_alice`",
      );
    });
  });

  describe("burn", () => {
    beforeEach(() => {
      createDenom(app, ALICE, "tkn");
      mint(app, ALICE, { denom: DENOM, amount: "100" });
    });

    it("burns from the sender", () => {
      const res = burn(app, ALICE, { denom: DENOM, amount: "40" });
      expect(res.events).toEqual([
        {
          type: "tf_burn",
          attributes: [
            { key: "burn_from_address", value: "addr_alice" },
            { key: "amount", value: "40" },
          ],
        },
      ]);
      expect(app.balance(ALICE, DENOM)).toBe(60n);
      expect(app.supply(DENOM)).toBe(60n);
    });

    it("propagates the bank's shortfall", () => {
      expect(() => burn(app, ALICE, { denom: DENOM, amount: "150" })).toThrow("Cannot Sub with 100 and 150");
      expect(app.balance(ALICE, DENOM)).toBe(100n);
    });

    it("checks identity and amount", () => {
      expect(() => burn(app, ALICE, undefined)).toThrow("missing amount");
      expect(() => burn(app, BOB, { denom: DENOM, amount: "1" })).toThrow(
        "Unauthorized burn. Not the creator of the denom.",
      );
      expect(() => burn(app, ALICE, { denom: DENOM, amount: "0" })).toThrow("Invalid zero amount");
    });
  });

  it("rejects unknown message types", () => {
    expect(() =>
      app.executeStargate(ALICE, "/osmosis.tokenfactory.v1beta1.MsgChangeAdmin", new Uint8Array()),
    ).toThrow("Unknown message type /osmosis.tokenfactory.v1beta1.MsgChangeAdmin");
  });

  it("answers no stargate queries", () => {
    expect(() => app.queryStargate("/osmosis.tokenfactory.v1beta1.Query/Params", Uint8Array.of(1, 2))).toThrow(
      "Unexpected stargate query: path=/osmosis.tokenfactory.v1beta1.Query/Params, data=0102",
    );
  });

  it("ignores sudo", () => {
    expect(app.sudoTx({ type: "stargate", msg: {} })).toEqual({ events: [] });
  });
});
