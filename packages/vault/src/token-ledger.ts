/**
 * TokenLedger: ERC-20 style balances and allowances for every token on the host.
 *
 * The native currency is tracked as one more token, keyed by the
 * NATIVE_CURRENCY sentinel address.
 *
 * Failures throw ProtocolRevertError carrying an Error(string) payload,
 * which is what a caller of a real token contract would observe.
 */

import { maxUint256 } from "viem";
import type { Address } from "@tradevault/types";
import { encodeRevertReason } from "./revert-decoder.js";
import { ProtocolRevertError } from "./types.js";
import type { Snapshottable } from "./types.js";

/** Sentinel address standing for the chain's native currency */
export const NATIVE_CURRENCY: Address = "0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE";

export interface TokenLedgerSnapshot {
  readonly balances: ReadonlyMap<string, ReadonlyMap<string, bigint>>;
  readonly allowances: ReadonlyMap<string, bigint>;
}

function key(address: Address): string {
  return address.toLowerCase();
}

function allowanceKey(token: Address, owner: Address, spender: Address): string {
  return `${key(token)}:${key(owner)}:${key(spender)}`;
}

function revert(reason: string): ProtocolRevertError {
  return new ProtocolRevertError(reason, encodeRevertReason(reason));
}

// =============================================================================
// TokenLedger
// =============================================================================

export class TokenLedger implements Snapshottable<TokenLedgerSnapshot> {
  private balances = new Map<string, Map<string, bigint>>();
  private allowances = new Map<string, bigint>();

  balanceOf(token: Address, holder: Address): bigint {
    return this.balances.get(key(token))?.get(key(holder)) ?? 0n;
  }

  mint(token: Address, to: Address, amount: bigint): void {
    this.credit(token, to, amount);
  }

  burn(token: Address, from: Address, amount: bigint): void {
    this.debit(token, from, amount, "burn amount exceeds balance");
  }

  transfer(token: Address, from: Address, to: Address, amount: bigint): void {
    this.debit(token, from, amount, "transfer amount exceeds balance");
    this.credit(token, to, amount);
  }

  approve(token: Address, owner: Address, spender: Address, amount: bigint): void {
    this.allowances.set(allowanceKey(token, owner, spender), amount);
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this.allowances.get(allowanceKey(token, owner, spender)) ?? 0n;
  }

  /**
   * Move tokens on the owner's behalf. An allowance of max uint256 is
   * treated as infinite and never decremented.
   */
  transferFrom(token: Address, spender: Address, from: Address, to: Address, amount: bigint): void {
    const current = this.allowance(token, from, spender);
    if (current < amount) {
      throw revert("insufficient allowance");
    }
    this.transfer(token, from, to, amount);
    if (current !== maxUint256) {
      this.approve(token, from, spender, current - amount);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshots
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): TokenLedgerSnapshot {
    const balances = new Map<string, Map<string, bigint>>();
    for (const [token, holders] of this.balances) {
      balances.set(token, new Map(holders));
    }
    return { balances, allowances: new Map(this.allowances) };
  }

  restore(snapshot: TokenLedgerSnapshot): void {
    this.balances = new Map();
    for (const [token, holders] of snapshot.balances) {
      this.balances.set(token, new Map(holders));
    }
    this.allowances = new Map(snapshot.allowances);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private credit(token: Address, holder: Address, amount: bigint): void {
    if (amount < 0n) {
      throw revert("negative amount");
    }
    let holders = this.balances.get(key(token));
    if (!holders) {
      holders = new Map();
      this.balances.set(key(token), holders);
    }
    holders.set(key(holder), (holders.get(key(holder)) ?? 0n) + amount);
  }

  private debit(token: Address, holder: Address, amount: bigint, reason: string): void {
    if (amount < 0n) {
      throw revert("negative amount");
    }
    const balance = this.balanceOf(token, holder);
    if (balance < amount) {
      throw revert(reason);
    }
    let holders = this.balances.get(key(token));
    if (!holders) {
      holders = new Map();
      this.balances.set(key(token), holders);
    }
    holders.set(key(holder), balance - amount);
  }
}
