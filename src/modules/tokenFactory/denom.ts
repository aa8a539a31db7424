import { ValidationError } from "../../errors";
import type { ChainVariant } from "../../config";
import type { Coin } from "../../core/types";

const U128_MAX = (1n << 128n) - 1n;

const PLAIN = /^[0-9]+[a-z]+$/;
const IBC = /^[0-9]+(ibc|IBC)\/[0-9A-F]{64}$/;
const FACTORY = /^[0-9]+factory\/[0-9a-z]+\/[0-9a-zA-Z]+$/;
const COREUM_ISSUED = /^([0-9]+)([a-z0-9]+)-([A-Za-z0-9]+)$/;

const GENERIC_FORMS = [PLAIN, IBC, FACTORY];
const COREUM_FORMS = [PLAIN, COREUM_ISSUED, IBC, FACTORY];

const invalid = (s: string) => new ValidationError("Invalid sdk string", { input: s });

/**
 * Parses `<amount><denom>` strings such as `10000000ucore`. The amount is the
 * leading run of digits and must fit in 128 bits.
 */
export const coinFromSdkString = (s: string, variant: ChainVariant = "generic"): Coin => {
  const forms = variant === "coreum" ? COREUM_FORMS : GENERIC_FORMS;
  if (!forms.some((re) => re.test(s))) throw invalid(s);

  const digits = /^[0-9]+/.exec(s)?.[0];
  if (digits === undefined) throw invalid(s);
  const amount = BigInt(digits);
  if (amount > U128_MAX) {
    throw new ValidationError(`amount ${digits} does not fit in 128 bits`, { input: s });
  }
  return { denom: s.slice(digits.length), amount };
};

/** Decimal u128 as carried in a wire coin's amount field. */
export const parseU128 = (s: string, what: string): bigint => {
  if (!/^[0-9]+$/.test(s)) throw new ValidationError(`invalid ${what} \`${s}\``);
  const n = BigInt(s);
  if (n > U128_MAX) throw new ValidationError(`invalid ${what} \`${s}\`: number too large`);
  return n;
};
