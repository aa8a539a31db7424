import type { Api } from "../core/types";
import { ValidationError } from "../errors";
import { asAddr } from "../types/brands";
import type { Addr } from "../types/brands";

/** Accepts any non-empty, lower-case address without whitespace. */
export class MockApi implements Api {
  addrValidate(input: string): Addr {
    if (input === "") throw new ValidationError("Invalid input: empty address");
    if (input !== input.toLowerCase() || /\s/.test(input)) {
      throw new ValidationError("Invalid input: address not normalized", { input });
    }
    return asAddr(input);
  }

  /** Test addresses: `addrMake("alice")` -> `addr_alice`. */
  addrMake(label: string): Addr {
    return this.addrValidate(`addr_${label.toLowerCase()}`);
  }
}
