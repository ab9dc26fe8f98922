/**
 * Tests for waitTxConfirmed: not-found polling, hard failures,
 * reverted receipts and the deadline.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { TransactionReceiptNotFoundError } from "viem";
import { waitTxConfirmed } from "../src/receipt.js";
import { TxRevertedError, TxTimeoutError } from "../src/types.js";
import { createFakeRpc, minedReceipt, silentLogger, txHashFor } from "./setup.js";
import type { FakeRpc } from "./setup.js";

const HASH = txHashFor(1);

describe("waitTxConfirmed", () => {
  let rpc: FakeRpc;
  let clock: number;
  const now = () => clock;
  const sleep = async (ms: number) => {
    clock += ms;
  };

  beforeEach(() => {
    rpc = createFakeRpc().rpc;
    clock = 0;
  });

  it("returns a receipt that is already mined", async () => {
    const receipt = await waitTxConfirmed(rpc, HASH, { now, sleep });
    expect(receipt).toEqual(minedReceipt(HASH));
    expect(rpc.getTransactionReceipt).toHaveBeenCalledTimes(1);
  });

  it("keeps polling while the receipt is not found", async () => {
    rpc.getTransactionReceipt
      .mockRejectedValueOnce(new TransactionReceiptNotFoundError({ hash: HASH }))
      .mockRejectedValueOnce(new TransactionReceiptNotFoundError({ hash: HASH }));

    const receipt = await waitTxConfirmed(rpc, HASH, { now, sleep, pollIntervalMs: 1_000, logger: silentLogger });

    expect(receipt.transactionHash).toBe(HASH);
    expect(rpc.getTransactionReceipt).toHaveBeenCalledTimes(3);
    expect(clock).toBe(2_000);
  });

  it("fails immediately on any other RPC error", async () => {
    rpc.getTransactionReceipt.mockRejectedValueOnce(new Error("HTTP request failed"));

    await expect(waitTxConfirmed(rpc, HASH, { now, sleep })).rejects.toThrow("HTTP request failed");
    expect(rpc.getTransactionReceipt).toHaveBeenCalledTimes(1);
  });

  it("throws TxRevertedError for a reverted receipt", async () => {
    rpc.getTransactionReceipt.mockResolvedValueOnce(minedReceipt(HASH, "reverted"));

    const error = await waitTxConfirmed(rpc, HASH, { now, sleep }).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(TxRevertedError);
    if (error instanceof TxRevertedError) {
      expect(error.code).toBe("TX_REVERTED");
      expect(error.blockNumber).toBe(101n);
    }
  });

  it("throws TxTimeoutError carrying the hash at the deadline", async () => {
    rpc.getTransactionReceipt.mockRejectedValue(new TransactionReceiptNotFoundError({ hash: HASH }));

    const error = await waitTxConfirmed(rpc, HASH, { now, sleep, timeoutMs: 3_000, pollIntervalMs: 1_000 })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TxTimeoutError);
    if (error instanceof TxTimeoutError) {
      expect(error.txHash).toBe(HASH);
      expect(error.timeoutMs).toBe(3_000);
    }
    // polls at t = 0, 1000, 2000, 3000
    expect(rpc.getTransactionReceipt).toHaveBeenCalledTimes(4);
  });

  it("gives up on a poll still pending at the deadline", async () => {
    rpc.getTransactionReceipt.mockReturnValueOnce(new Promise<never>(() => {}));

    const error = await waitTxConfirmed(rpc, HASH, { timeoutMs: 20, sleep }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TxTimeoutError);
    expect(rpc.getTransactionReceipt).toHaveBeenCalledTimes(1);
  });
});
