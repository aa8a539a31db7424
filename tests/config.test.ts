import { describe, it, expect, afterEach, vi } from "vitest";
import { loadConfig, resolveTokenFactoryConfig, tokenFactoryDefaults } from "../src/config";
import { ValidationError } from "../src/errors";
import { createTokenFactory } from "../src/modules/tokenFactory";
import { CoreumTokenFactory } from "../src/modules/tokenFactory/coreum";
import { GenericTokenFactory } from "../src/modules/tokenFactory/generic";

describe("token factory config", () => {
  it("has per-variant defaults", () => {
    expect(tokenFactoryDefaults("generic")).toEqual({
      moduleDenomPrefix: "factory",
      maxSubdenomLen: 32,
      maxCreatorLen: 75,
      denomCreationFee: "10000000uosmo",
      feeDenom: "uosmo",
    });
    expect(tokenFactoryDefaults("coreum")).toEqual({
      moduleDenomPrefix: "",
      maxSubdenomLen: 32,
      maxCreatorLen: 75,
      denomCreationFee: "10000000ucore",
      feeDenom: "ucore",
    });
  });

  it("merges overrides over the defaults", () => {
    const cfg = resolveTokenFactoryConfig("coreum", { maxSubdenomLen: 10 });
    expect(cfg.maxSubdenomLen).toBe(10);
    expect(cfg.denomCreationFee).toBe("10000000ucore");
  });

  it("rejects invalid overrides", () => {
    expect(() => resolveTokenFactoryConfig("generic", { maxSubdenomLen: 0 })).toThrow(ValidationError);
    expect(() => resolveTokenFactoryConfig("generic", { denomCreationFee: "uosmo" })).toThrow(
      "Invalid token factory config: fee must be <amount><denom>",
    );
  });

  it("builds the factory for each variant", () => {
    const generic = createTokenFactory("generic");
    expect(generic).toBeInstanceOf(GenericTokenFactory);
    expect(generic.variant).toBe("generic");

    const coreum = createTokenFactory("coreum", { maxCreatorLen: 90 });
    expect(coreum).toBeInstanceOf(CoreumTokenFactory);
    expect(coreum.config.maxCreatorLen).toBe(90);
  });
});

describe("runtime config", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("picks the factory variant from SIM_VARIANT", () => {
    vi.stubEnv("SIM_VARIANT", "coreum");
    expect(createTokenFactory()).toBeInstanceOf(CoreumTokenFactory);
    expect(createTokenFactory(undefined, { maxSubdenomLen: 8 }).config.maxSubdenomLen).toBe(8);

    vi.stubEnv("SIM_VARIANT", "");
    expect(createTokenFactory().variant).toBe("generic");

    vi.stubEnv("SIM_VARIANT", "cosmos");
    expect(() => createTokenFactory()).toThrow(/^Invalid environment: /);
  });

  it("falls back to defaults for unset or empty variables", () => {
    expect(loadConfig({})).toEqual({ logLevel: "info", logPretty: false, variant: "generic" });
    expect(loadConfig({ LOG_LEVEL: "" })).toEqual({ logLevel: "info", logPretty: false, variant: "generic" });
  });

  it("reads level, pretty flag and variant", () => {
    expect(loadConfig({ LOG_LEVEL: "debug", LOG_PRETTY: "true", SIM_VARIANT: "coreum" })).toEqual({
      logLevel: "debug",
      logPretty: true,
      variant: "coreum",
    });
  });

  it("rejects unknown values", () => {
    expect(() => loadConfig({ SIM_VARIANT: "cosmos" })).toThrow(/^Invalid environment: /);
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ValidationError);
  });
});
