/**
 * @tradevault/vault: Executable model of the Trade vault.
 *
 * Manager-driven custody contract with:
 * - Dual-authorized swaps (manager submits, trigger co-signs)
 * - Atomic batches of swap instructions
 * - Money-market supply / withdraw / borrow / repay
 * - Margin-protocol plugin approval and fee queries
 *
 * Runs on InMemoryChain, an in-process host ledger with serialized,
 * all-or-nothing transactions.
 */

// Types
export type {
  VaultErrorCode,
  Snapshottable,
  TxRequest,
  TxReceipt,
  CallResult,
  CallFrame,
  CallableTarget,
  InstructionPayload,
  SwapInstruction,
  InterestRateMode,
  LendingPool,
  UserReserveData,
  LendingDataProvider,
  NativeGateway,
  MarginRouter,
  MarginPositionRouter,
  VaultProtocols,
  AccessPolicy,
  InitializeParams,
  VaultSettings,
  VaultContext,
} from "./types.js";
export { VaultError, ProtocolRevertError } from "./types.js";

// Vault
export { TradeVault } from "./trade-vault.js";
export { AccessControl } from "./access-control.js";
export type { AccessSnapshot } from "./access-control.js";
export { SwapExecutor } from "./swap-executor.js";
export { LendingAdapter, isNativeCurrency } from "./lending-adapter.js";
export type { LendingProtocols } from "./lending-adapter.js";
export { MarginAdapter } from "./margin-adapter.js";

// Codecs
export { recoverSigner } from "./signature.js";
export {
  decodeRevert,
  encodeRevertReason,
  ERROR_STRING_SELECTOR,
  SILENT_REVERT_MESSAGE,
} from "./revert-decoder.js";
export {
  encodeSwapInstruction,
  decodeSwapInstruction,
  encodeInstructionPayload,
  decodeInstructionPayload,
  SWAP_INSTRUCTION_PARAMS,
  INSTRUCTION_PAYLOAD_PARAMS,
} from "./instruction.js";

// Host ledger
export { InMemoryChain } from "./in-memory-chain.js";
export type { ChainTxRequest } from "./in-memory-chain.js";
export { TokenLedger, NATIVE_CURRENCY } from "./token-ledger.js";
export type { TokenLedgerSnapshot } from "./token-ledger.js";

// Protocol stand-ins
export {
  FixedRateSwapper,
  FIXED_RATE_SWAPPER_ABI,
  encodeSwapCall,
} from "./sim/fixed-rate-swapper.js";
export type { SwapRate, SwapCall, SwapHook } from "./sim/fixed-rate-swapper.js";
export { InMemoryLendingPool } from "./sim/in-memory-lending-pool.js";
export type { LendingPoolSnapshot } from "./sim/in-memory-lending-pool.js";
export { InMemoryNativeGateway } from "./sim/in-memory-native-gateway.js";
export { InMemoryMarginRouter, InMemoryPositionRouter } from "./sim/in-memory-margin-router.js";
export {
  deploySimulatedVault,
  DEFAULT_DEPLOYMENT_ADDRESSES,
} from "./sim/deployment.js";
export type {
  DeploymentAddresses,
  DeploymentOptions,
  SimulatedDeployment,
} from "./sim/deployment.js";
