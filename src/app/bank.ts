import * as v from "valibot";
import { toJsonBinary } from "../codec/json";
import { pairKey, RecordMap } from "../core/storage";
import { emptyResponse } from "../core/types";
import type { AppResponse, BankMsg, BankQuery, BankSudo, Coin, ReadonlyStorage, Storage } from "../core/types";
import { InsufficientFundsError, ValidationError } from "../errors";

const U128_MAX = (1n << 128n) - 1n;

const amountSchema = v.pipe(v.string(), v.regex(/^[0-9]+$/), v.transform<string, bigint>(BigInt));

/** (address, denom) -> balance; zero balances are not stored. */
const BALANCES = new RecordMap<readonly [string, string], bigint>("bank/balances", pairKey, amountSchema);

const coinJson = (denom: string, amount: bigint) => ({ denom, amount: amount.toString() });

/**
 * Balances per account and denom. Supply is the sum over all accounts, so
 * every mint and burn is reflected without separate bookkeeping.
 */
export class BankKeeper {
  balance(storage: ReadonlyStorage, address: string, denom: string): bigint {
    return BALANCES.mayLoad(storage, [address, denom]) ?? 0n;
  }

  allBalances(storage: ReadonlyStorage, address: string): Coin[] {
    return BALANCES.entries(storage)
      .filter(([[addr]]) => addr === address)
      .map(([[, denom], amount]) => ({ denom, amount }));
  }

  supply(storage: ReadonlyStorage, denom: string): bigint {
    return BALANCES.entries(storage)
      .filter(([[, d]]) => d === denom)
      .reduce((sum, [, amount]) => sum + amount, 0n);
  }

  private setBalance(storage: Storage, address: string, denom: string, amount: bigint): void {
    if (amount === 0n) BALANCES.remove(storage, [address, denom]);
    else BALANCES.save(storage, [address, denom], amount);
  }

  private add(storage: Storage, address: string, coins: readonly Coin[]): void {
    for (const { denom, amount } of coins) {
      const have = this.balance(storage, address, denom);
      if (have + amount > U128_MAX) {
        throw new ValidationError(`Overflow: Cannot Add with ${have} and ${amount}`, { denom });
      }
      this.setBalance(storage, address, denom, have + amount);
    }
  }

  private sub(storage: Storage, address: string, coins: readonly Coin[]): void {
    for (const { denom, amount } of coins) {
      const have = this.balance(storage, address, denom);
      if (have < amount) throw new InsufficientFundsError(have, amount, denom);
      this.setBalance(storage, address, denom, have - amount);
    }
  }

  /** Overwrites the account's balances; used to seed test state. */
  initBalance(storage: Storage, address: string, coins: readonly Coin[]): void {
    for (const coin of this.allBalances(storage, address)) {
      this.setBalance(storage, address, coin.denom, 0n);
    }
    this.add(storage, address, coins);
  }

  execute(storage: Storage, sender: string, msg: BankMsg): AppResponse {
    switch (msg.type) {
      case "send":
        if (msg.toAddress === "") throw new ValidationError("Invalid recipient: empty address");
        this.sub(storage, sender, msg.amount);
        this.add(storage, msg.toAddress, msg.amount);
        return emptyResponse();
      case "burn":
        this.sub(storage, sender, msg.amount);
        return emptyResponse();
    }
  }

  sudo(storage: Storage, msg: BankSudo): AppResponse {
    switch (msg.type) {
      case "mint":
        this.add(storage, msg.toAddress, msg.amount);
        return emptyResponse();
    }
  }

  /** Answers with the cosmwasm JSON shapes. */
  query(storage: ReadonlyStorage, q: BankQuery): Uint8Array {
    switch (q.type) {
      case "balance":
        return toJsonBinary({ amount: coinJson(q.denom, this.balance(storage, q.address, q.denom)) });
      case "allBalances":
        return toJsonBinary({
          amount: this.allBalances(storage, q.address).map((c) => coinJson(c.denom, c.amount)),
        });
      case "supply":
        return toJsonBinary({ amount: coinJson(q.denom, this.supply(storage, q.denom)) });
    }
  }
}
