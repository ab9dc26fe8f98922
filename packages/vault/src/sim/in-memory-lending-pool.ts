/**
 * InMemoryLendingPool: money-market pool and its data provider in one.
 *
 * Tracks supplied balances and debt per (asset, user, rate mode). Funds
 * move through the host TokenLedger, so supplies need an allowance and
 * borrows need pool liquidity. Interest and collateral math are out of
 * scope: a listed reserve lends whatever liquidity it has.
 */

import { maxUint256 } from "viem";
import type { Address } from "@tradevault/types";
import { encodeRevertReason } from "../revert-decoder.js";
import type { TokenLedger } from "../token-ledger.js";
import { ProtocolRevertError } from "../types.js";
import type {
  InterestRateMode,
  LendingDataProvider,
  LendingPool,
  Snapshottable,
  UserReserveData,
} from "../types.js";

export interface LendingPoolSnapshot {
  readonly supplied: ReadonlyMap<string, bigint>;
  readonly debt: ReadonlyMap<string, bigint>;
  readonly lastReferralCode: number | undefined;
}

const STABLE: InterestRateMode = 1n;
const VARIABLE: InterestRateMode = 2n;

function revert(reason: string): ProtocolRevertError {
  return new ProtocolRevertError(reason, encodeRevertReason(reason));
}

function positionKey(asset: Address, user: Address): string {
  return `${asset.toLowerCase()}:${user.toLowerCase()}`;
}

function debtKey(asset: Address, user: Address, mode: InterestRateMode): string {
  return `${positionKey(asset, user)}:${mode}`;
}

export class InMemoryLendingPool
  implements LendingPool, LendingDataProvider, Snapshottable<LendingPoolSnapshot>
{
  private readonly reserves = new Set<string>();
  private supplied = new Map<string, bigint>();
  private debt = new Map<string, bigint>();
  private _lastReferralCode: number | undefined;

  constructor(
    readonly address: Address,
    private readonly tokens: TokenLedger,
  ) {}

  listReserve(asset: Address): void {
    this.reserves.add(asset.toLowerCase());
  }

  /** Referral code passed with the most recent supply or borrow */
  get lastReferralCode(): number | undefined {
    return this._lastReferralCode;
  }

  // ───────────────────────────────────────────────────────────────────────
  // LendingPool
  // ───────────────────────────────────────────────────────────────────────

  async supply(caller: Address, asset: Address, amount: bigint, onBehalfOf: Address, referralCode: number): Promise<void> {
    this.requireReserve(asset);
    if (amount === 0n) throw revert("invalid amount");
    this.tokens.transferFrom(asset, this.address, caller, this.address, amount);
    const key = positionKey(asset, onBehalfOf);
    this.supplied.set(key, (this.supplied.get(key) ?? 0n) + amount);
    this._lastReferralCode = referralCode;
  }

  async withdraw(caller: Address, asset: Address, amount: bigint, to: Address): Promise<bigint> {
    this.requireReserve(asset);
    const key = positionKey(asset, caller);
    const balance = this.supplied.get(key) ?? 0n;
    const amountToWithdraw = amount === maxUint256 ? balance : amount;
    if (amountToWithdraw === 0n) throw revert("invalid amount");
    if (amountToWithdraw > balance) throw revert("not enough available user balance");
    this.supplied.set(key, balance - amountToWithdraw);
    this.tokens.transfer(asset, this.address, to, amountToWithdraw);
    return amountToWithdraw;
  }

  async borrow(
    caller: Address,
    asset: Address,
    amount: bigint,
    interestRateMode: InterestRateMode,
    referralCode: number,
    onBehalfOf: Address,
  ): Promise<void> {
    this.requireReserve(asset);
    this.requireRateMode(interestRateMode);
    if (amount === 0n) throw revert("invalid amount");
    if (this.tokens.balanceOf(asset, this.address) < amount) throw revert("not enough liquidity");
    const key = debtKey(asset, onBehalfOf, interestRateMode);
    this.debt.set(key, (this.debt.get(key) ?? 0n) + amount);
    this.tokens.transfer(asset, this.address, caller, amount);
    this._lastReferralCode = referralCode;
  }

  async repay(
    caller: Address,
    asset: Address,
    amount: bigint,
    interestRateMode: InterestRateMode,
    onBehalfOf: Address,
  ): Promise<bigint> {
    this.requireReserve(asset);
    this.requireRateMode(interestRateMode);
    const key = debtKey(asset, onBehalfOf, interestRateMode);
    const outstanding = this.debt.get(key) ?? 0n;
    if (outstanding === 0n) throw revert("no debt of selected type");
    const paid = amount < outstanding ? amount : outstanding;
    this.tokens.transferFrom(asset, this.address, caller, this.address, paid);
    this.debt.set(key, outstanding - paid);
    return paid;
  }

  // ───────────────────────────────────────────────────────────────────────
  // LendingDataProvider
  // ───────────────────────────────────────────────────────────────────────

  async getUserReserveData(asset: Address, user: Address): Promise<UserReserveData> {
    const supplied = this.supplied.get(positionKey(asset, user)) ?? 0n;
    return {
      currentATokenBalance: supplied,
      currentStableDebt: this.debt.get(debtKey(asset, user, STABLE)) ?? 0n,
      currentVariableDebt: this.debt.get(debtKey(asset, user, VARIABLE)) ?? 0n,
      usageAsCollateralEnabled: supplied > 0n,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshots
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): LendingPoolSnapshot {
    return {
      supplied: new Map(this.supplied),
      debt: new Map(this.debt),
      lastReferralCode: this._lastReferralCode,
    };
  }

  restore(snapshot: LendingPoolSnapshot): void {
    this.supplied = new Map(snapshot.supplied);
    this.debt = new Map(snapshot.debt);
    this._lastReferralCode = snapshot.lastReferralCode;
  }

  private requireReserve(asset: Address): void {
    if (!this.reserves.has(asset.toLowerCase())) throw revert("reserve not active");
  }

  private requireRateMode(mode: InterestRateMode): void {
    if (mode !== STABLE && mode !== VARIABLE) throw revert("invalid interest rate mode");
  }
}
