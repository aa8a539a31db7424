import { loadConfig } from "../../config";
import type { ChainVariant, TokenFactoryConfig } from "../../config";
import type { ILogger } from "../../logging";
import type { TokenFactory } from "./common";
import { CoreumTokenFactory } from "./coreum";
import { GenericTokenFactory } from "./generic";

export type { TokenFactory } from "./common";
export { CoreumTokenFactory } from "./coreum";
export { GenericTokenFactory } from "./generic";
export { coinFromSdkString } from "./denom";

/** Without an explicit variant, `SIM_VARIANT` from the environment decides. */
export const createTokenFactory = (
  variant: ChainVariant = loadConfig().variant,
  overrides: Partial<TokenFactoryConfig> = {},
  logger?: ILogger,
): TokenFactory => {
  switch (variant) {
    case "generic":
      return new GenericTokenFactory(overrides, logger);
    case "coreum":
      return new CoreumTokenFactory(overrides, logger);
  }
};
