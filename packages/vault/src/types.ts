/**
 * Trade Vault Types
 *
 * Domain types for the executable model of the Trade vault contract.
 *
 * The vault has three kinds of collaborators:
 *
 * 1. The host ledger (InMemoryChain): balances, atomic transactions, event log
 * 2. Swapper contracts: arbitrary targets reached through a generic call
 * 3. Protocol integrations: money-market pool and margin router
 *
 * Rules:
 * - Amounts are bigint base units
 * - Every state change happens inside a host transaction
 * - A thrown error aborts and rolls back the whole transaction
 */

import type { Address, Hex, TxHash, EventLog } from "@tradevault/types";
import type { AccessControl } from "./access-control.js";
import type { InMemoryChain } from "./in-memory-chain.js";

// =============================================================================
// Errors
// =============================================================================

export type VaultErrorCode =
  | "UNAUTHORIZED"
  | "HASH_MISMATCH"
  | "INVALID_SIGNATURE"
  | "SWAP_EXECUTION_FAILED"
  | "INSUFFICIENT_BALANCE"
  | "UNSUPPORTED_ASSET"
  | "VALUE_MISMATCH"
  | "ALREADY_INITIALIZED"
  | "MALFORMED_INSTRUCTION"
  | "ARITHMETIC_UNDERFLOW"
  | "INVALID_ARGUMENT"
  | "REENTRANCY";

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  /** Decoded revert reason of a failed swapper call (SWAP_EXECUTION_FAILED only) */
  public readonly reason?: string;

  constructor(code: VaultErrorCode, message: string, reason?: string) {
    super(message);
    this.name = "VaultError";
    this.code = code;
    if (reason !== undefined) {
      this.reason = reason;
    }
  }
}

/**
 * Raised by an external contract (token, pool, router) to revert.
 * Carries the raw ABI revert data the caller would observe.
 */
export class ProtocolRevertError extends Error {
  public readonly returnData: Hex;

  constructor(message: string, returnData: Hex) {
    super(message);
    this.name = "ProtocolRevertError";
    this.returnData = returnData;
  }
}

// =============================================================================
// Host ledger
// =============================================================================

/**
 * State that participates in transaction rollback.
 */
export interface Snapshottable<S> {
  snapshot(): S;
  restore(snapshot: S): void;
}

/**
 * Who sends a transaction or message call, and how much native value it carries.
 */
export interface TxRequest {
  readonly from: Address;
  readonly value?: bigint;
}

/**
 * Result of a successful transaction. Failed transactions throw instead.
 */
export interface TxReceipt<T> {
  readonly txHash: TxHash;
  readonly result: T;
  readonly logs: readonly EventLog[];
}

/**
 * Outcome of a low-level call.
 */
export interface CallResult {
  readonly success: boolean;
  readonly returnData: Hex;
}

/**
 * Message-call context passed to a callable target.
 */
export interface CallFrame {
  /** Immediate caller (msg.sender) */
  readonly caller: Address;
  /** Native value forwarded with the call */
  readonly value: bigint;
}

/**
 * A contract reachable through a generic low-level call.
 *
 * Targets may report failure by returning `success: false` or by throwing;
 * the host converts a throw into a failed call and discards the call's effects.
 */
export interface CallableTarget {
  call(frame: CallFrame, data: Hex): Promise<CallResult>;
}

// =============================================================================
// Swap instructions
// =============================================================================

/**
 * Trigger authorization for one swapper call.
 * Invariant: digest == keccak256(innerCallData), signed by the trigger.
 */
export interface InstructionPayload {
  readonly digest: Hex;
  readonly signature: Hex;
  readonly innerCallData: Hex;
}

/**
 * A single swap as submitted by a manager.
 *
 * `tokenIn`, `tokenOut` and `amountIn` are advisory: the signed
 * `innerCallData` alone decides what the swapper does.
 */
export interface SwapInstruction {
  readonly swapper: Address;
  readonly tokenIn: Address;
  readonly tokenOut: Address;
  readonly amountIn: bigint;
  /** ABI-encoded InstructionPayload */
  readonly payload: Hex;
}

// =============================================================================
// Protocol integrations
// =============================================================================

/** Aave-style interest rate mode: 1 = stable, 2 = variable */
export type InterestRateMode = bigint;

export interface LendingPool {
  readonly address: Address;
  supply(caller: Address, asset: Address, amount: bigint, onBehalfOf: Address, referralCode: number): Promise<void>;
  withdraw(caller: Address, asset: Address, amount: bigint, to: Address): Promise<bigint>;
  borrow(
    caller: Address,
    asset: Address,
    amount: bigint,
    interestRateMode: InterestRateMode,
    referralCode: number,
    onBehalfOf: Address,
  ): Promise<void>;
  repay(
    caller: Address,
    asset: Address,
    amount: bigint,
    interestRateMode: InterestRateMode,
    onBehalfOf: Address,
  ): Promise<bigint>;
}

/**
 * Per-user reserve data as reported by the pool's data provider.
 */
export interface UserReserveData {
  readonly currentATokenBalance: bigint;
  readonly currentStableDebt: bigint;
  readonly currentVariableDebt: bigint;
  readonly usageAsCollateralEnabled: boolean;
}

export interface LendingDataProvider {
  readonly address: Address;
  getUserReserveData(asset: Address, user: Address): Promise<UserReserveData>;
}

/**
 * Gateway that repays native-currency debt on a user's behalf.
 * The native value must already have been sent to the gateway.
 */
export interface NativeGateway {
  readonly address: Address;
  repayNative(
    caller: Address,
    pool: Address,
    amount: bigint,
    interestRateMode: InterestRateMode,
    onBehalfOf: Address,
  ): Promise<void>;
}

export interface MarginRouter {
  readonly address: Address;
  approvePlugin(caller: Address, plugin: Address): Promise<void>;
}

export interface MarginPositionRouter {
  readonly address: Address;
  minExecutionFee(): Promise<bigint>;
}

/**
 * External protocols wired into a vault at construction.
 */
export interface VaultProtocols {
  readonly lendingPool: LendingPool;
  readonly lendingDataProvider: LendingDataProvider;
  readonly nativeGateway: NativeGateway;
  readonly marginRouter: MarginRouter;
  readonly marginPositionRouter: MarginPositionRouter;
}

// =============================================================================
// Vault state
// =============================================================================

/**
 * Who may call `setManager` and `gmxApprovePlugin`.
 *
 * - "legacy": anyone (the deployed contract's observed behavior)
 * - "guarded": managers only (recommended for new deployments)
 */
export type AccessPolicy = "legacy" | "guarded";

export interface InitializeParams {
  /** Off-chain identity that co-signs every swap instruction */
  readonly trigger: Address;
  /** Designated manager added alongside the initializing caller */
  readonly manager: Address;
  readonly lendingReferralCode?: number;
  readonly marginReferralCode?: Hex;
  /** Allowance granted to a swapper before each swap. Default: max uint256 */
  readonly swapApprovalAmount?: bigint;
  readonly accessPolicy?: AccessPolicy;
}

/**
 * Non-authorization vault settings (addresses and tags).
 */
export interface VaultSettings {
  readonly lendingPool: Address;
  readonly lendingDataProvider: Address;
  readonly nativeGateway: Address;
  readonly lendingReferralCode: number;
  readonly marginRouter: Address;
  readonly marginPositionRouter: Address;
  readonly marginReferralCode: Hex;
  readonly swapApprovalAmount: bigint;
  readonly accessPolicy: AccessPolicy;
}

/**
 * What the vault's components share: where the vault lives, the host it
 * runs on, its authorization state and its current settings.
 */
export interface VaultContext {
  readonly address: Address;
  readonly chain: InMemoryChain;
  readonly access: AccessControl;
  settings(): VaultSettings;
}
