/**
 * ChainSubmitter: Signs and broadcasts transactions on one chain.
 *
 * Owns the account's nonce for that chain. Sends are serialized through
 * a promise-chain lock so concurrent callers never race for a nonce;
 * confirmation waits happen outside the lock.
 *
 * Nonce handling:
 * - Seeded lazily from the pending nonce
 * - Advanced only after the node accepts a transaction
 * - Re-seeded when the node reports a stale nonce, and the send is
 *   retried once with the fresh nonce
 * - Consumed without a resend when the node already holds the
 *   transaction: the caller gets TxAlreadyKnownError
 */

import type { Logger } from "pino";
import type { Address, ChainId, Hex, TxHash } from "@tradevault/types";
import { waitTxConfirmed } from "./receipt.js";
import type { WaitOptions } from "./receipt.js";
import {
  DEFAULT_RETRY_POLICY,
  isAlreadyKnownError,
  isNonceCollisionError,
  readWithRetry,
  sleep,
} from "./retry.js";
import type { RetryPolicy } from "./retry.js";
import { TxAlreadyKnownError } from "./types.js";
import type { ChainRpc, TxReceiptSummary } from "./types.js";

export const DEFAULT_GAS_PRICE_MULTIPLIER = 1.1;

export interface SubmitterOptions {
  /** Applied to the node's suggested gas price. Default: 1.1 */
  readonly gasPriceMultiplier?: number;
  /** Backoff for gas price and nonce reads */
  readonly retry?: RetryPolicy;
  readonly timeoutMs?: number;
  readonly pollIntervalMs?: number;
  readonly logger?: Logger;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly now?: () => number;
}

export interface SubmitRequest {
  readonly to: Address;
  readonly data: Hex;
  readonly value?: bigint;
  /**
   * When set, the gas limit is the node's estimate times this factor.
   * Otherwise the gas limit is left to the node.
   */
  readonly gasMultiplier?: number;
}

/**
 * Scale a wei amount by a decimal factor, to three decimal places.
 */
export function applyMultiplier(value: bigint, multiplier: number): bigint {
  return (value * BigInt(Math.round(multiplier * 1000))) / 1000n;
}

export class ChainSubmitter {
  private readonly gasPriceMultiplier: number;
  private readonly retry: RetryPolicy;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private readonly waitOptions: WaitOptions;
  private readonly log: Logger | undefined;

  private nonce: number | undefined;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly rpc: ChainRpc,
    options: SubmitterOptions = {},
  ) {
    this.gasPriceMultiplier = options.gasPriceMultiplier ?? DEFAULT_GAS_PRICE_MULTIPLIER;
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.sleepFn = options.sleep ?? sleep;
    this.log = options.logger;
    this.waitOptions = {
      ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
      ...(options.pollIntervalMs !== undefined ? { pollIntervalMs: options.pollIntervalMs } : {}),
      ...(options.logger ? { logger: options.logger } : {}),
      sleep: this.sleepFn,
      ...(options.now ? { now: options.now } : {}),
    };
  }

  get chainId(): ChainId {
    return this.rpc.chainId;
  }

  get account(): Address {
    return this.rpc.account;
  }

  /**
   * Price, sign and broadcast a transaction. Resolves with its hash once
   * the node has accepted it.
   *
   * @throws {TxAlreadyKnownError} an identical transaction is already pending
   */
  submit(request: SubmitRequest): Promise<TxHash> {
    return this.withSendLock(() => this.send(request));
  }

  /**
   * Submit, then poll for the receipt.
   *
   * @throws {TxTimeoutError} the outcome is unknown
   * @throws {TxRevertedError} the transaction was mined and reverted
   */
  async submitAndWait(request: SubmitRequest): Promise<TxReceiptSummary> {
    const hash = await this.submit(request);
    return waitTxConfirmed(this.rpc, hash, this.waitOptions);
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private withSendLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.queue;
    let release = () => {};
    this.queue = new Promise<void>((resolve) => {
      release = resolve;
    });
    return previous.then(fn).finally(() => release());
  }

  private async send(request: SubmitRequest): Promise<TxHash> {
    const suggested = await this.read("getGasPrice", () => this.rpc.getGasPrice());
    const gasPrice = applyMultiplier(suggested, this.gasPriceMultiplier);

    let gas: bigint | undefined;
    if (request.gasMultiplier !== undefined) {
      const estimate = await this.rpc.estimateGas({
        to: request.to,
        data: request.data,
        ...(request.value !== undefined ? { value: request.value } : {}),
      });
      gas = applyMultiplier(estimate, request.gasMultiplier);
    }

    const nonce = await this.nextNonce();
    try {
      return await this.broadcast(request, gasPrice, gas, nonce);
    } catch (error) {
      if (isAlreadyKnownError(error)) {
        this.nonce = nonce + 1;
        this.log?.warn({ nonce, to: request.to }, "Transaction already known to the node, not resending");
        throw new TxAlreadyKnownError(nonce, request.to);
      }
      if (!isNonceCollisionError(error)) {
        throw error;
      }
      this.log?.warn(
        { nonce, err: error instanceof Error ? error.message : String(error) },
        "Nonce collision, re-seeding from the pending nonce",
      );
      this.nonce = undefined;
      return this.broadcast(request, gasPrice, gas, await this.nextNonce());
    }
  }

  private async broadcast(
    request: SubmitRequest,
    gasPrice: bigint,
    gas: bigint | undefined,
    nonce: number,
  ): Promise<TxHash> {
    const hash = await this.rpc.sendTransaction({
      to: request.to,
      data: request.data,
      ...(request.value !== undefined ? { value: request.value } : {}),
      ...(gas !== undefined ? { gas } : {}),
      gasPrice,
      nonce,
    });
    this.nonce = nonce + 1;
    this.log?.info({ txHash: hash, nonce, to: request.to }, "Transaction sent");
    return hash;
  }

  private async nextNonce(): Promise<number> {
    if (this.nonce === undefined) {
      this.nonce = await this.read("getPendingNonce", () => this.rpc.getPendingNonce());
    }
    return this.nonce;
  }

  private read<T>(label: string, fn: () => Promise<T>): Promise<T> {
    return readWithRetry(fn, {
      policy: this.retry,
      sleep: this.sleepFn,
      label,
      ...(this.log ? { logger: this.log } : {}),
    });
  }
}
