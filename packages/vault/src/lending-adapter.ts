/**
 * LendingAdapter: money-market supply, withdraw, borrow and repay.
 *
 * Allowances are granted for exactly the amount moved, immediately
 * before the pool call. Native-currency debt is repaid through the
 * gateway; native borrowing is not supported.
 */

import { isAddressEqual } from "viem";
import type { Address, LendingEvent } from "@tradevault/types";
import { NATIVE_CURRENCY } from "./token-ledger.js";
import { VaultError } from "./types.js";
import type {
  InterestRateMode,
  LendingDataProvider,
  LendingPool,
  NativeGateway,
  VaultContext,
} from "./types.js";

export interface LendingProtocols {
  readonly pool: LendingPool;
  readonly dataProvider: LendingDataProvider;
  readonly nativeGateway: NativeGateway;
}

export function isNativeCurrency(asset: Address): boolean {
  return isAddressEqual(asset, NATIVE_CURRENCY);
}

export class LendingAdapter {
  constructor(
    private readonly ctx: VaultContext,
    private readonly protocols: LendingProtocols,
  ) {}

  // ───────────────────────────────────────────────────────────────────────
  // Operations
  // ───────────────────────────────────────────────────────────────────────

  async supply(asset: Address, amount: bigint): Promise<void> {
    const { address, chain } = this.ctx;
    const held = chain.tokens.balanceOf(asset, address);
    if (held < amount) {
      throw new VaultError(
        "INSUFFICIENT_BALANCE",
        `Vault holds ${held} of ${asset}, cannot supply ${amount}`,
      );
    }
    chain.tokens.approve(asset, address, this.protocols.pool.address, amount);
    await this.protocols.pool.supply(address, asset, amount, address, this.ctx.settings().lendingReferralCode);
    this.emit("AaveSupply", asset, amount);
  }

  /**
   * Returns the amount the pool actually released.
   */
  async withdraw(asset: Address, amount: bigint): Promise<bigint> {
    const { address } = this.ctx;
    const withdrawn = await this.protocols.pool.withdraw(address, asset, amount, address);
    this.emit("AaveWithdraw", asset, amount);
    return withdrawn;
  }

  async borrow(asset: Address, amount: bigint, rateMode: InterestRateMode): Promise<void> {
    if (isNativeCurrency(asset)) {
      throw new VaultError("UNSUPPORTED_ASSET", "Native currency cannot be borrowed");
    }
    const { address } = this.ctx;
    await this.protocols.pool.borrow(
      address,
      asset,
      amount,
      rateMode,
      this.ctx.settings().lendingReferralCode,
      address,
    );
    this.emit("AaveBorrow", asset, amount);
  }

  /**
   * `value` is the native currency attached to the enclosing transaction.
   */
  async repay(asset: Address, amount: bigint, rateMode: InterestRateMode, value: bigint): Promise<void> {
    const { address, chain } = this.ctx;
    const { pool, nativeGateway } = this.protocols;

    if (isNativeCurrency(asset)) {
      if (value !== amount) {
        throw new VaultError("VALUE_MISMATCH", `Attached value ${value} does not equal repay amount ${amount}`);
      }
      chain.tokens.transfer(NATIVE_CURRENCY, address, nativeGateway.address, value);
      await nativeGateway.repayNative(address, pool.address, amount, rateMode, address);
    } else {
      chain.tokens.approve(asset, address, pool.address, amount);
      await pool.repay(address, asset, amount, rateMode, address);
    }
    this.emit("AaveRepay", asset, amount);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Supplied balance per asset, aligned with the input order.
   */
  async getPositionSizes(assets: readonly Address[]): Promise<readonly bigint[]> {
    const sizes: bigint[] = [];
    for (const asset of assets) {
      const data = await this.protocols.dataProvider.getUserReserveData(asset, this.ctx.address);
      sizes.push(data.currentATokenBalance);
    }
    return sizes;
  }

  /**
   * The vault's own holdings per asset, aligned with the input order.
   */
  getAssetsSizes(assets: readonly Address[]): readonly bigint[] {
    const { address, chain } = this.ctx;
    return assets.map((asset) =>
      isNativeCurrency(asset) ? chain.nativeBalanceOf(address) : chain.tokens.balanceOf(asset, address),
    );
  }

  private emit(name: LendingEvent["name"], asset: Address, amount: bigint): void {
    this.ctx.chain.emit(this.ctx.address, { name, asset, amount });
  }
}
