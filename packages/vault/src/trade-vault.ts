/**
 * TradeVault: top-level coordinator of the Trade vault model.
 *
 * Composes:
 * - AccessControl (managers and trigger)
 * - SwapExecutor (swap, multiSwap)
 * - LendingAdapter (money-market operations)
 * - MarginAdapter (margin-protocol boundary)
 *
 * Every entry point runs as one host transaction from `tx.from` to the
 * vault: it either completes or leaves no trace. Entry points are
 * non-reentrant; a callback from an external contract into any of them
 * fails with REENTRANCY.
 */

import { maxUint256, zeroHash } from "viem";
import { isBytes32 } from "@tradevault/types";
import type { Address, Hex } from "@tradevault/types";
import { AccessControl } from "./access-control.js";
import type { InMemoryChain } from "./in-memory-chain.js";
import { LendingAdapter } from "./lending-adapter.js";
import { MarginAdapter } from "./margin-adapter.js";
import { SwapExecutor } from "./swap-executor.js";
import { VaultError } from "./types.js";
import type {
  InitializeParams,
  InterestRateMode,
  SwapInstruction,
  TxReceipt,
  TxRequest,
  VaultContext,
  VaultProtocols,
  VaultSettings,
} from "./types.js";

type Guard = "manager" | "policy" | "none";

const MAX_LENDING_REFERRAL_CODE = 0xffff;

function checkLendingReferralCode(code: number): number {
  if (!Number.isInteger(code) || code < 0 || code > MAX_LENDING_REFERRAL_CODE) {
    throw new VaultError("INVALID_ARGUMENT", `Lending referral code ${code} is not a uint16`);
  }
  return code;
}

function checkMarginReferralCode(code: Hex): Hex {
  if (!isBytes32(code)) {
    throw new VaultError("INVALID_ARGUMENT", `Margin referral code ${code} is not 32 bytes`);
  }
  return code;
}

// =============================================================================
// TradeVault
// =============================================================================

export class TradeVault {
  readonly address: Address;
  private readonly chain: InMemoryChain;
  private readonly access = new AccessControl();
  private readonly swaps: SwapExecutor;
  private readonly lending: LendingAdapter;
  private readonly margin: MarginAdapter;
  private state: VaultSettings;
  private entered = false;

  constructor(address: Address, chain: InMemoryChain, protocols: VaultProtocols) {
    this.address = address;
    this.chain = chain;
    this.state = {
      lendingPool: protocols.lendingPool.address,
      lendingDataProvider: protocols.lendingDataProvider.address,
      nativeGateway: protocols.nativeGateway.address,
      lendingReferralCode: 0,
      marginRouter: protocols.marginRouter.address,
      marginPositionRouter: protocols.marginPositionRouter.address,
      marginReferralCode: zeroHash,
      swapApprovalAmount: maxUint256,
      accessPolicy: "legacy",
    };

    const ctx: VaultContext = {
      address,
      chain,
      access: this.access,
      settings: () => this.state,
    };
    this.swaps = new SwapExecutor(ctx);
    this.lending = new LendingAdapter(ctx, {
      pool: protocols.lendingPool,
      dataProvider: protocols.lendingDataProvider,
      nativeGateway: protocols.nativeGateway,
    });
    this.margin = new MarginAdapter(ctx, protocols.marginRouter, protocols.marginPositionRouter);

    chain.register(this.access);
    chain.register<VaultSettings>({
      snapshot: () => this.state,
      restore: (snapshot) => {
        this.state = snapshot;
      },
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Initialization
  // ───────────────────────────────────────────────────────────────────────

  /**
   * One-time setup (proxy initializer). The caller and `params.manager`
   * become managers and `params.trigger` becomes the swap co-signer.
   */
  initialize(tx: TxRequest, params: InitializeParams): Promise<TxReceipt<void>> {
    return this.enter(tx, "none", async () => {
      this.access.initialize(tx.from, params.trigger, params.manager);
      this.state = {
        ...this.state,
        lendingReferralCode:
          params.lendingReferralCode !== undefined
            ? checkLendingReferralCode(params.lendingReferralCode)
            : this.state.lendingReferralCode,
        marginReferralCode:
          params.marginReferralCode !== undefined
            ? checkMarginReferralCode(params.marginReferralCode)
            : this.state.marginReferralCode,
        swapApprovalAmount: params.swapApprovalAmount ?? this.state.swapApprovalAmount,
        accessPolicy: params.accessPolicy ?? this.state.accessPolicy,
      };
      this.chain.emit(this.address, { name: "Initialized", trigger: params.trigger });
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Access control
  // ───────────────────────────────────────────────────────────────────────

  setManager(tx: TxRequest, identity: Address, enabled: boolean): Promise<TxReceipt<void>> {
    return this.enter(tx, "policy", async () => {
      this.chain.emit(this.address, this.access.setManager(identity, enabled));
    });
  }

  isManager(identity: Address): boolean {
    return this.access.isManager(identity);
  }

  get trigger(): Address {
    return this.access.trigger;
  }

  get settings(): VaultSettings {
    return this.state;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Swaps
  // ───────────────────────────────────────────────────────────────────────

  swap(tx: TxRequest, instruction: SwapInstruction): Promise<TxReceipt<bigint>> {
    return this.enter(tx, "manager", () => this.swaps.swap(instruction));
  }

  /**
   * Execute ABI-encoded swap instructions in order, all or nothing.
   */
  multiSwap(tx: TxRequest, instructions: readonly Hex[]): Promise<TxReceipt<readonly bigint[]>> {
    return this.enter(tx, "manager", () => this.swaps.multiSwap(instructions));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lending
  // ───────────────────────────────────────────────────────────────────────

  aaveSupply(tx: TxRequest, asset: Address, amount: bigint): Promise<TxReceipt<void>> {
    return this.enter(tx, "manager", () => this.lending.supply(asset, amount));
  }

  aaveWithdraw(tx: TxRequest, asset: Address, amount: bigint): Promise<TxReceipt<bigint>> {
    return this.enter(tx, "manager", () => this.lending.withdraw(asset, amount));
  }

  aaveBorrow(
    tx: TxRequest,
    asset: Address,
    amount: bigint,
    rateMode: InterestRateMode,
  ): Promise<TxReceipt<void>> {
    return this.enter(tx, "manager", () => this.lending.borrow(asset, amount, rateMode));
  }

  /**
   * For native-currency debt, attach exactly `amount` as `tx.value`.
   */
  aaveRepay(
    tx: TxRequest,
    asset: Address,
    amount: bigint,
    rateMode: InterestRateMode,
  ): Promise<TxReceipt<void>> {
    return this.enter(tx, "manager", () => this.lending.repay(asset, amount, rateMode, tx.value ?? 0n));
  }

  setAaveReferralCode(tx: TxRequest, code: number): Promise<TxReceipt<void>> {
    return this.enter(tx, "manager", async () => {
      this.state = { ...this.state, lendingReferralCode: checkLendingReferralCode(code) };
    });
  }

  getAavePositionSizes(assets: readonly Address[]): Promise<readonly bigint[]> {
    return this.lending.getPositionSizes(assets);
  }

  getAssetsSizes(assets: readonly Address[]): readonly bigint[] {
    return this.lending.getAssetsSizes(assets);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Margin
  // ───────────────────────────────────────────────────────────────────────

  gmxApprovePlugin(tx: TxRequest): Promise<TxReceipt<void>> {
    return this.enter(tx, "policy", () => this.margin.approveExecutionPlugin());
  }

  setGmxReferralCode(tx: TxRequest, code: Hex): Promise<TxReceipt<void>> {
    return this.enter(tx, "manager", async () => {
      this.state = { ...this.state, marginReferralCode: checkMarginReferralCode(code) };
    });
  }

  gmxMinExecutionFee(): Promise<bigint> {
    return this.margin.getMinExecutionFee();
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private enter<T>(tx: TxRequest, guard: Guard, fn: () => Promise<T>): Promise<TxReceipt<T>> {
    return this.chain.transact({ ...tx, to: this.address }, async () => {
      if (this.entered) {
        throw new VaultError("REENTRANCY", "Re-entrant call into the vault");
      }
      this.entered = true;
      try {
        if (guard === "manager" || (guard === "policy" && this.state.accessPolicy === "guarded")) {
          this.access.requireManager(tx.from);
        }
        return await fn();
      } finally {
        this.entered = false;
      }
    });
  }
}
