/**
 * Chain Client Types
 *
 * The RPC port the client drives, the receipt shape it waits on,
 * and the client's error taxonomy.
 */

import type { Address, ChainId, Hex, TxHash } from "@tradevault/types";

// =============================================================================
// RPC Port
// =============================================================================

/**
 * A read-only contract call.
 */
export interface ContractCall {
  readonly to: Address;
  readonly data: Hex;
}

/**
 * A fully priced transaction ready to be signed and broadcast.
 */
export interface OutgoingTx extends ContractCall {
  readonly value?: bigint;
  readonly gas?: bigint;
  readonly gasPrice: bigint;
  readonly nonce: number;
}

/**
 * The fields of a mined receipt the client relies on.
 */
export interface TxReceiptSummary {
  readonly transactionHash: TxHash;
  readonly status: "success" | "reverted";
  readonly blockNumber: bigint;
  readonly gasUsed: bigint;
}

/**
 * One chain's node, seen through the signing account.
 *
 * `getTransactionReceipt` rejects with viem's
 * `TransactionReceiptNotFoundError` while the transaction is not mined.
 */
export interface ChainRpc {
  readonly chainId: ChainId;

  /** Address of the signing account */
  readonly account: Address;

  getBlockNumber(): Promise<bigint>;
  getPendingNonce(): Promise<number>;
  getGasPrice(): Promise<bigint>;
  estimateGas(call: ContractCall & { readonly value?: bigint }): Promise<bigint>;
  call(call: ContractCall): Promise<Hex>;
  sendTransaction(tx: OutgoingTx): Promise<TxHash>;
  getTransactionReceipt(hash: TxHash): Promise<TxReceiptSummary>;
}

// =============================================================================
// Errors
// =============================================================================

export type ChainClientErrorCode =
  | "CONFIG_INVALID"
  | "CHAIN_NOT_FOUND"
  | "CHAIN_ALREADY_REGISTERED"
  | "TX_TIMEOUT"
  | "TX_REVERTED"
  | "TX_ALREADY_KNOWN"
  | "TRIGGER_KEY_MISSING"
  | "RETRY_EXHAUSTED";

export class ChainClientError extends Error {
  public readonly code: ChainClientErrorCode;

  constructor(code: ChainClientErrorCode, message: string) {
    super(message);
    this.name = "ChainClientError";
    this.code = code;
  }
}

export class ConfigError extends ChainClientError {
  constructor(public readonly issues: readonly string[]) {
    super("CONFIG_INVALID", `Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export class ChainNotFoundError extends ChainClientError {
  constructor(public readonly chainId: ChainId) {
    super("CHAIN_NOT_FOUND", `Chain ${chainId} not found`);
    this.name = "ChainNotFoundError";
  }
}

/**
 * The confirmation deadline passed. The transaction may still be mined:
 * its outcome is unknown, not failed.
 */
export class TxTimeoutError extends ChainClientError {
  constructor(
    public readonly txHash: TxHash,
    public readonly timeoutMs: number,
  ) {
    super("TX_TIMEOUT", `Transaction ${txHash} not confirmed within ${timeoutMs}ms`);
    this.name = "TxTimeoutError";
  }
}

export class TxRevertedError extends ChainClientError {
  constructor(
    public readonly txHash: TxHash,
    public readonly blockNumber: bigint,
  ) {
    super("TX_REVERTED", `Transaction ${txHash} reverted in block ${blockNumber}`);
    this.name = "TxRevertedError";
  }
}

/**
 * The node already holds a transaction at this nonce with the same
 * content. It was not resent; re-query state before retrying.
 */
export class TxAlreadyKnownError extends ChainClientError {
  constructor(
    public readonly nonce: number,
    public readonly to: Address,
  ) {
    super("TX_ALREADY_KNOWN", `Transaction to ${to} with nonce ${nonce} is already known to the node`);
    this.name = "TxAlreadyKnownError";
  }
}

export class RetryExhaustedError extends ChainClientError {
  constructor(
    public readonly label: string,
    public readonly attempts: number,
    public readonly lastError: unknown,
  ) {
    const msg = lastError instanceof Error ? lastError.message : String(lastError);
    super("RETRY_EXHAUSTED", `${label} failed after ${attempts} attempts: ${msg}`);
    this.name = "RetryExhaustedError";
  }
}
