/**
 * Vault Event Types
 *
 * The append-only log emitted by the Trade vault. The off-chain
 * collaborator consumes these for accounting and indexing.
 *
 * Rules:
 * - Events are immutable after emission
 * - A reverted transaction leaves no events behind
 * - Discriminated by `name`, mirroring the contract's event names
 */

import type { Address, TxHash } from "./chain.js";

export interface SwapSuccessEvent {
  readonly name: "SwapSuccess";
  readonly tokenIn: Address;
  readonly tokenOut: Address;
  readonly amountIn: bigint;
  readonly amountOut: bigint;
}

export interface ManagerAddedEvent {
  readonly name: "ManagerAdded";
  readonly manager: Address;
}

export interface ManagerRemovedEvent {
  readonly name: "ManagerRemoved";
  readonly manager: Address;
}

/** Money-market events all carry the same (asset, amount) shape. */
export interface LendingEvent {
  readonly name: "AaveSupply" | "AaveWithdraw" | "AaveBorrow" | "AaveRepay";
  readonly asset: Address;
  readonly amount: bigint;
}

export interface InitializedEvent {
  readonly name: "Initialized";
  readonly trigger: Address;
}

export type VaultEvent =
  | SwapSuccessEvent
  | ManagerAddedEvent
  | ManagerRemovedEvent
  | LendingEvent
  | InitializedEvent;

export type VaultEventName = VaultEvent["name"];

/**
 * An event as recorded in a transaction receipt.
 */
export interface EventLog<TEvent = VaultEvent> {
  /** Contract that emitted the event */
  readonly address: Address;

  /** The decoded event */
  readonly event: TEvent;

  /** Hash of the transaction that emitted it */
  readonly txHash: TxHash;

  /** Position across the whole chain log (0-based, monotonically increasing) */
  readonly logIndex: number;
}
