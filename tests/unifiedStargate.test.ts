import { describe, it, expect, beforeEach } from "vitest";
import { fromString } from "uint8arrays";
import { AppBuilder } from "../src/app/app";
import type { App } from "../src/app/app";
import {
  queryAllBalancesRequest,
  queryBalanceRequest,
  queryContractInfoRequest,
  querySmartContractStateRequest,
  querySupplyOfRequest,
} from "../src/codec/queries";
import { event } from "../src/core/types";
import type { StargateModule } from "../src/core/types";
import { StargateFailingModule } from "../src/modules/failing";
import {
  QUERY_ALL_BALANCES_PATH,
  QUERY_BALANCE_PATH,
  QUERY_SUPPLY_PATH,
  QUERY_WASM_CONTRACT_INFO_PATH,
  QUERY_WASM_CONTRACT_SMART_PATH,
} from "../src/modules/paths";
import { UnifiedStargate } from "../src/modules/unifiedStargate";
import { ALICE, BOB, readJson } from "./helpers/app";

const bridgeApp = (extra?: StargateModule): App =>
  new AppBuilder()
    .withStargate(extra ? UnifiedStargate.withExtra(extra) : UnifiedStargate.withoutExtra())
    .withBalance(ALICE, [
      { denom: "ucore", amount: 100n },
      { denom: "uatom", amount: 5n },
    ])
    .withBalance(BOB, [{ denom: "ucore", amount: 50n }])
    .build();

const smart = (app: App, address: string, query: string) =>
  app.queryStargate(
    QUERY_WASM_CONTRACT_SMART_PATH,
    querySmartContractStateRequest.encode({ address, queryData: fromString(query, "utf8") }),
  );

describe("UnifiedStargate", () => {
  let app: App;

  beforeEach(() => {
    app = bridgeApp();
  });

  describe("bank paths", () => {
    it("answers AllBalances in denom order", () => {
      const raw = app.queryStargate(QUERY_ALL_BALANCES_PATH, queryAllBalancesRequest.encode({ address: "addr_alice" }));
      expect(readJson(raw)).toEqual({
        balances: [
          { denom: "uatom", amount: "5" },
          { denom: "ucore", amount: "100" },
        ],
        pagination: null,
      });
    });

    it("answers Balance, zero for an unknown denom", () => {
      const q = (denom: string) =>
        readJson(app.queryStargate(QUERY_BALANCE_PATH, queryBalanceRequest.encode({ address: "addr_bob", denom })));
      expect(q("ucore")).toEqual({ balance: { denom: "ucore", amount: "50" } });
      expect(q("uatom")).toEqual({ balance: { denom: "uatom", amount: "0" } });
    });

    it("answers SupplyOf across accounts", () => {
      const raw = app.queryStargate(QUERY_SUPPLY_PATH, querySupplyOfRequest.encode({ denom: "ucore" }));
      expect(readJson(raw)).toEqual({ amount: { denom: "ucore", amount: "150" } });
    });

    it("rejects a malformed request", () => {
      expect(() => app.queryStargate(QUERY_BALANCE_PATH, Uint8Array.of(0x05))).toThrow(
        "failed to decode QueryBalanceRequest: expected an RLP list",
      );
    });
  });

  describe("wasm paths", () => {
    beforeEach(() => {
      app.registerContract("addr_counter", {
        codeId: 3,
        creator: "addr_alice",
        query: (msg) => {
          const text = new TextDecoder().decode(msg);
          if (text === '{"count":{}}') return fromString('{"count":7}', "utf8");
          throw new Error(`unknown query ${text}`);
        },
      });
    });

    it("wraps a smart query answer in base64", () => {
      expect(readJson(smart(app, "addr_counter", '{"count":{}}'))).toEqual({ data: "eyJjb3VudCI6N30=" });
    });

    it("passes a contract error through with its own message", () => {
      expect(() => smart(app, "addr_counter", '{"other":{}}')).toThrow('unknown query {"other":{}}');
      let caught: unknown;
      try {
        smart(app, "addr_counter", "{}");
      } catch (e) {
        caught = e;
      }
      expect(caught).toMatchObject({ name: "ContractQueryError", message: "unknown query {}" });
    });

    it("reports an unknown contract as a system error", () => {
      expect(() => smart(app, "addr_nobody", "{}")).toThrow("Querier system error: No such contract: addr_nobody");
      expect(() =>
        app.queryStargate(QUERY_WASM_CONTRACT_INFO_PATH, queryContractInfoRequest.encode({ address: "addr_nobody" })),
      ).toThrow("Querier system error: No such contract: addr_nobody");
    });

    it("answers ContractInfo", () => {
      app.registerContract("addr_admin", {
        codeId: 4,
        creator: "addr_bob",
        admin: "addr_alice",
        ibcPort: "wasm.addr_admin",
        query: () => new Uint8Array(),
      });
      const info = (address: string) =>
        readJson(app.queryStargate(QUERY_WASM_CONTRACT_INFO_PATH, queryContractInfoRequest.encode({ address })));

      expect(info("addr_counter")).toEqual({
        address: "addr_counter",
        contract_info: {
          code_id: 3,
          creator: "addr_alice",
          admin: "",
          label: "",
          created: null,
          ibc_port_id: "",
          extension: null,
        },
      });
      expect(info("addr_admin")).toMatchObject({
        contract_info: { code_id: 4, creator: "addr_bob", admin: "addr_alice", ibc_port_id: "wasm.addr_admin" },
      });
    });
  });

  describe("without a nested module", () => {
    it("rejects messages and unknown paths", () => {
      expect(() => app.executeStargate(ALICE, "/test.v1.MsgPing", Uint8Array.of(1))).toThrow(
        "No stargate exec handler for /test.v1.MsgPing",
      );
      expect(() => app.queryStargate("/test.v1.Query/Ping", Uint8Array.of(1, 2))).toThrow(
        "Unexpected stargate query: path=/test.v1.Query/Ping, data=0102",
      );
    });

    it("accepts sudo with no effect", () => {
      expect(app.sudoTx({ type: "stargate", msg: {} })).toEqual({ events: [] });
    });
  });

  describe("with a nested module", () => {
    const stub: StargateModule = {
      execute: () => ({ events: [event("stub_exec")] }),
      query: () => fromString("stub", "utf8"),
      sudo: () => ({ events: [event("stub_sudo")] }),
    };

    it("delegates messages, sudo and unknown paths", () => {
      app = bridgeApp(stub);
      expect(app.executeStargate(ALICE, "/test.v1.MsgPing", new Uint8Array()).events).toEqual([
        { type: "stub_exec", attributes: [] },
      ]);
      expect(new TextDecoder().decode(app.queryStargate("/test.v1.Query/Ping", new Uint8Array()))).toBe("stub");
      expect(app.sudoTx({ type: "stargate", msg: {} }).events).toEqual([{ type: "stub_sudo", attributes: [] }]);
    });

    it("still answers bank paths itself", () => {
      app = bridgeApp(stub);
      const raw = app.queryStargate(QUERY_SUPPLY_PATH, querySupplyOfRequest.encode({ denom: "uatom" }));
      expect(readJson(raw)).toEqual({ amount: { denom: "uatom", amount: "5" } });
    });

    it("surfaces the failing module's errors", () => {
      app = bridgeApp(new StargateFailingModule());
      expect(() => app.executeStargate(ALICE, "/test.v1.MsgPing", Uint8Array.of(0xab, 0x01))).toThrow(
        "Unexpected stargate execute: type=/test.v1.MsgPing, value=ab01",
      );
      expect(() => app.queryStargate("/test.v1.Query/Ping", new Uint8Array())).toThrow(
        "Unexpected stargate query: path=/test.v1.Query/Ping, data=",
      );
    });
  });
});
