/**
 * Runtime and module configuration.
 *
 * Everything is parsed through valibot so a bad override fails at build time of
 * the app rather than in the middle of a simulated transaction.
 */

import * as v from "valibot";
import { ValidationError } from "./errors";

export const DEFAULT_COIN_DENOM = "uosmo";
export const COREUM_FEE_DENOM = "ucore";
export const CREATE_TOKEN_FEE = "10000000";

export const chainVariantSchema = v.picklist(["generic", "coreum"]);
export type ChainVariant = v.InferOutput<typeof chainVariantSchema>;

const logLevelSchema = v.picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const runtimeConfigSchema = v.object({
  LOG_LEVEL: v.optional(logLevelSchema, "info"),
  LOG_PRETTY: v.optional(
    v.pipe(
      v.picklist(["true", "false"]),
      v.transform((s) => s === "true"),
    ),
    "false",
  ),
  SIM_VARIANT: v.optional(chainVariantSchema, "generic"),
});

export type RuntimeConfig = {
  logLevel: v.InferOutput<typeof logLevelSchema>;
  logPretty: boolean;
  variant: ChainVariant;
};

export const tokenFactoryConfigSchema = v.object({
  moduleDenomPrefix: v.string(),
  maxSubdenomLen: v.pipe(v.number(), v.integer(), v.minValue(1)),
  maxCreatorLen: v.pipe(v.number(), v.integer(), v.minValue(1)),
  denomCreationFee: v.pipe(v.string(), v.regex(/^[0-9]+\S+$/, "fee must be <amount><denom>")),
  feeDenom: v.pipe(v.string(), v.minLength(1)),
});

export type TokenFactoryConfig = v.InferOutput<typeof tokenFactoryConfigSchema>;

export const tokenFactoryDefaults = (variant: ChainVariant): TokenFactoryConfig =>
  variant === "coreum"
    ? {
        moduleDenomPrefix: "",
        maxSubdenomLen: 32,
        maxCreatorLen: 59 + 16,
        denomCreationFee: CREATE_TOKEN_FEE + COREUM_FEE_DENOM,
        feeDenom: COREUM_FEE_DENOM,
      }
    : {
        moduleDenomPrefix: "factory",
        maxSubdenomLen: 32,
        maxCreatorLen: 59 + 16,
        denomCreationFee: CREATE_TOKEN_FEE + DEFAULT_COIN_DENOM,
        feeDenom: DEFAULT_COIN_DENOM,
      };

export const resolveTokenFactoryConfig = (
  variant: ChainVariant,
  overrides: Partial<TokenFactoryConfig> = {},
): TokenFactoryConfig => {
  const merged = { ...tokenFactoryDefaults(variant), ...overrides };
  const res = v.safeParse(tokenFactoryConfigSchema, merged);
  if (!res.success) {
    throw new ValidationError(
      `Invalid token factory config: ${res.issues.map((i) => i.message).join("; ")}`,
      { variant },
    );
  }
  return res.output;
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): RuntimeConfig => {
  const res = v.safeParse(runtimeConfigSchema, {
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    LOG_PRETTY: env.LOG_PRETTY || undefined,
    SIM_VARIANT: env.SIM_VARIANT || undefined,
  });
  if (!res.success) {
    throw new ValidationError(
      `Invalid environment: ${res.issues.map((i) => i.message).join("; ")}`,
    );
  }
  return {
    logLevel: res.output.LOG_LEVEL,
    logPretty: res.output.LOG_PRETTY,
    variant: res.output.SIM_VARIANT,
  };
};
