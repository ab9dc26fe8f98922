/**
 * @tradevault/types: Shared types for the Trade vault stack.
 *
 * Used by both the executable vault model and the off-chain client:
 * - EVM primitives (addresses, hex, chain ids)
 * - Vault event log types
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Amounts are bigint base units
 */

// Chain types
export type {
  Hex,
  Address,
  ChainId,
  TxHash,
} from "./chain.js";

// Event types
export type {
  SwapSuccessEvent,
  ManagerAddedEvent,
  ManagerRemovedEvent,
  LendingEvent,
  InitializedEvent,
  VaultEvent,
  VaultEventName,
  EventLog,
} from "./event.js";

// Runtime type guards
export { isBytes32 } from "./guards.js";
