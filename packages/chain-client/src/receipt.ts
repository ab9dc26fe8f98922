/**
 * Receipt polling.
 *
 * A transaction counts as confirmed once its receipt exists. Until the
 * deadline, "not found" means keep polling; any other RPC failure ends
 * the wait immediately. A poll that is still pending at the deadline is
 * abandoned.
 */

import { TransactionReceiptNotFoundError } from "viem";
import type { Logger } from "pino";
import type { TxHash } from "@tradevault/types";
import { sleep } from "./retry.js";
import { TxRevertedError, TxTimeoutError } from "./types.js";
import type { ChainRpc, TxReceiptSummary } from "./types.js";

export const DEFAULT_TX_TIMEOUT_MS = 15_000;
export const DEFAULT_POLL_INTERVAL_MS = 1_000;

const DEADLINE = Symbol("deadline");

export interface WaitOptions {
  readonly timeoutMs?: number;
  readonly pollIntervalMs?: number;
  readonly logger?: Logger;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly now?: () => number;
}

/**
 * Poll until `hash` is mined.
 *
 * @throws {TxRevertedError} mined with status reverted
 * @throws {TxTimeoutError} still not mined at the deadline
 */
export async function waitTxConfirmed(
  rpc: Pick<ChainRpc, "getTransactionReceipt">,
  hash: TxHash,
  options: WaitOptions = {},
): Promise<TxReceiptSummary> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TX_TIMEOUT_MS;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const sleepFn = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const log = options.logger?.child({ txHash: hash });

  const deadline = now() + timeoutMs;

  for (;;) {
    let receipt: TxReceiptSummary | typeof DEADLINE | undefined;
    try {
      receipt = await beforeDeadline(rpc.getTransactionReceipt(hash), deadline - now());
    } catch (error) {
      if (!(error instanceof TransactionReceiptNotFoundError)) {
        throw error;
      }
      log?.debug("Transaction not yet mined");
    }

    if (receipt === DEADLINE) {
      log?.warn("Receipt poll still pending at the deadline");
      throw new TxTimeoutError(hash, timeoutMs);
    }
    if (receipt) {
      if (receipt.status === "reverted") {
        log?.warn({ blockNumber: receipt.blockNumber.toString() }, "Transaction reverted");
        throw new TxRevertedError(hash, receipt.blockNumber);
      }
      log?.info({ blockNumber: receipt.blockNumber.toString() }, "Transaction mined");
      return receipt;
    }

    if (now() >= deadline) {
      throw new TxTimeoutError(hash, timeoutMs);
    }
    await sleepFn(pollIntervalMs);
  }
}

function beforeDeadline<T>(poll: Promise<T>, remainingMs: number): Promise<T | typeof DEADLINE> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<typeof DEADLINE>((resolve) => {
    timer = setTimeout(() => resolve(DEADLINE), Math.max(remainingMs, 0));
  });
  return Promise.race([poll, expired]).finally(() => clearTimeout(timer));
}
