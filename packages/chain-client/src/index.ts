/**
 * @tradevault/chain-client: Off-chain orchestration client.
 *
 * Drives deployed Trade vaults over EVM JSON-RPC:
 * - Per-chain transaction submission with a serialized nonce
 * - Receipt polling under a bounded deadline
 * - Trigger-signed swap payloads in the vault's wire format
 * - Fund, money-market and margin queries
 */

// Types
export type {
  ContractCall,
  OutgoingTx,
  TxReceiptSummary,
  ChainRpc,
  ChainClientErrorCode,
} from "./types.js";
export {
  ChainClientError,
  ConfigError,
  ChainNotFoundError,
  TxTimeoutError,
  TxRevertedError,
  TxAlreadyKnownError,
  RetryExhaustedError,
} from "./types.js";

// Configuration & logging
export { loadConfig, ConfigSchema, ChainConfigSchema } from "./config.js";
export type { ClientConfig, ChainConfig } from "./config.js";
export { createLogger } from "./logger.js";

// Submission
export {
  ChainSubmitter,
  applyMultiplier,
  DEFAULT_GAS_PRICE_MULTIPLIER,
} from "./submitter.js";
export type { SubmitterOptions, SubmitRequest } from "./submitter.js";
export {
  waitTxConfirmed,
  DEFAULT_TX_TIMEOUT_MS,
  DEFAULT_POLL_INTERVAL_MS,
} from "./receipt.js";
export type { WaitOptions } from "./receipt.js";
export {
  readWithRetry,
  backoffDelay,
  sleep,
  isRetryableRpcError,
  isNonceCollisionError,
  isAlreadyKnownError,
  DEFAULT_RETRY_POLICY,
} from "./retry.js";
export type { RetryPolicy, RetryOptions } from "./retry.js";

// Chains
export { createViemRpc } from "./rpc.js";
export type { ViemRpcOptions } from "./rpc.js";
export { ChainRegistry, createChainRegistry } from "./registry.js";
export type {
  ChainConnection,
  ChainStatus,
  MultiChainResult,
  ChainRegistryOptions,
} from "./registry.js";

// Operations
export {
  Interactor,
  createInteractor,
  DEFAULT_MULTISWAP_GAS_MULTIPLIER,
  POSITION_DECIMALS,
} from "./interactor.js";
export type { InteractorOptions, UserData, GmxPositionQuery } from "./interactor.js";
export {
  hashCallData,
  signInstructionPayload,
  encodeSwapInstruction,
  encodeSwapLeg,
} from "./payload.js";
export type { SwapLeg } from "./payload.js";
export {
  TRADE_ABI,
  FEEDER_ABI,
  INTERACTION_ABI,
  GMX_READER_ABI,
  ARBITRAGE_ABI,
} from "./abi.js";
