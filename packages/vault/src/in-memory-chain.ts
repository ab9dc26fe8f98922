/**
 * InMemoryChain: the host ledger the vault runs on.
 *
 * Provides what the vault needs from an EVM host:
 * - Token and native balances (TokenLedger)
 * - Serialized, all-or-nothing transactions
 * - Low-level calls whose failure discards only the callee's effects
 * - An append-only event log; reverted transactions leave no events
 *
 * Any state that must roll back with a transaction registers itself
 * through `register()`.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { keccak256, toHex } from "viem";
import type { Address, EventLog, Hex, TxHash, VaultEvent } from "@tradevault/types";
import { encodeRevertReason } from "./revert-decoder.js";
import { NATIVE_CURRENCY, TokenLedger } from "./token-ledger.js";
import { ProtocolRevertError } from "./types.js";
import type {
  CallableTarget,
  CallResult,
  Snapshottable,
  TxReceipt,
  TxRequest,
} from "./types.js";

interface PendingLog {
  readonly address: Address;
  readonly event: VaultEvent;
}

interface TxContext {
  readonly txHash: TxHash;
  readonly pending: PendingLog[];
}

/** Takes a snapshot and returns the closure that restores it */
type Checkpointer = () => () => void;

export interface ChainTxRequest extends TxRequest {
  readonly to: Address;
}

function revertDataOf(error: unknown): Hex {
  if (error instanceof ProtocolRevertError) return error.returnData;
  if (error instanceof Error) return encodeRevertReason(error.message);
  return "0x";
}

// =============================================================================
// InMemoryChain
// =============================================================================

export class InMemoryChain {
  readonly tokens = new TokenLedger();
  private readonly participants: Checkpointer[] = [];
  private readonly contracts = new Map<string, CallableTarget>();
  private readonly committed: EventLog[] = [];
  private readonly context = new AsyncLocalStorage<TxContext>();
  private sendLock: Promise<void> = Promise.resolve();
  private txCount = 0;

  constructor() {
    this.register(this.tokens);
  }

  /**
   * Enroll state in transaction rollback.
   */
  register<S>(state: Snapshottable<S>): void {
    this.participants.push(() => {
      const snapshot = state.snapshot();
      return () => state.restore(snapshot);
    });
  }

  /**
   * Place a callable contract at an address.
   */
  deployContract(address: Address, target: CallableTarget): void {
    if (this.contracts.has(address.toLowerCase())) {
      throw new Error(`Contract already deployed at ${address}`);
    }
    this.contracts.set(address.toLowerCase(), target);
  }

  hasCode(address: Address): boolean {
    return this.contracts.has(address.toLowerCase());
  }

  // ───────────────────────────────────────────────────────────────────────
  // Balances
  // ───────────────────────────────────────────────────────────────────────

  nativeBalanceOf(holder: Address): bigint {
    return this.tokens.balanceOf(NATIVE_CURRENCY, holder);
  }

  /**
   * Credit native currency out of thin air (genesis allocation / faucet).
   */
  fund(holder: Address, amount: bigint): void {
    this.tokens.mint(NATIVE_CURRENCY, holder, amount);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Event log
  // ───────────────────────────────────────────────────────────────────────

  get logs(): readonly EventLog[] {
    return this.committed;
  }

  emit(address: Address, event: VaultEvent): void {
    const tx = this.context.getStore();
    if (!tx) {
      throw new Error(`Cannot emit ${event.name} outside of a transaction`);
    }
    tx.pending.push({ address, event });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Execution
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run `fn` as a transaction from `request.from` to `request.to`.
   *
   * Top-level transactions are serialized. When invoked from inside a
   * running transaction (a contract calling back into another), `fn` runs
   * inline as a nested message call instead.
   *
   * If `fn` throws, every state change it made is undone and the error
   * is rethrown.
   */
  async transact<T>(request: ChainTxRequest, fn: () => Promise<T>): Promise<TxReceipt<T>> {
    const current = this.context.getStore();
    if (current) {
      return this.runNested(current, request, fn);
    }
    return this.withSendLock(() => this.runTopLevel(request, fn));
  }

  /**
   * Low-level call from inside a transaction.
   *
   * Never throws for callee failure: a revert is reported as
   * `success: false` with the revert data, and the callee's effects
   * are discarded. Calling an address with no code succeeds with
   * empty return data.
   */
  async call(from: Address, to: Address, data: Hex, value = 0n): Promise<CallResult> {
    const tx = this.context.getStore();
    if (!tx) {
      throw new Error("Low-level call outside of a transaction");
    }
    const rollback = this.checkpoint(tx);
    try {
      if (value > 0n) {
        this.tokens.transfer(NATIVE_CURRENCY, from, to, value);
      }
      const target = this.contracts.get(to.toLowerCase());
      if (!target) {
        return { success: true, returnData: "0x" };
      }
      const result = await target.call({ caller: from, value }, data);
      if (!result.success) {
        rollback();
      }
      return result;
    } catch (error) {
      rollback();
      return { success: false, returnData: revertDataOf(error) };
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private withSendLock<T>(fn: () => Promise<T>): Promise<T> {
    const previous = this.sendLock;
    let release: () => void = () => {};
    this.sendLock = new Promise<void>((resolve) => {
      release = resolve;
    });

    return previous.then(fn).finally(() => {
      release();
    });
  }

  private async runTopLevel<T>(request: ChainTxRequest, fn: () => Promise<T>): Promise<TxReceipt<T>> {
    const txHash = keccak256(toHex(`tx:${this.txCount}`));
    this.txCount++;
    const tx: TxContext = { txHash, pending: [] };

    return this.context.run(tx, async () => {
      const rollback = this.checkpoint(tx);
      try {
        this.moveValue(request);
        const result = await fn();
        return { txHash, result, logs: this.commit(tx) };
      } catch (error) {
        rollback();
        throw error;
      }
    });
  }

  private async runNested<T>(
    tx: TxContext,
    request: ChainTxRequest,
    fn: () => Promise<T>,
  ): Promise<TxReceipt<T>> {
    const rollback = this.checkpoint(tx);
    const start = tx.pending.length;
    try {
      this.moveValue(request);
      const result = await fn();
      const logs = tx.pending.slice(start).map((log, i) => ({
        ...log,
        txHash: tx.txHash,
        logIndex: this.committed.length + start + i,
      }));
      return { txHash: tx.txHash, result, logs };
    } catch (error) {
      rollback();
      throw error;
    }
  }

  private moveValue(request: ChainTxRequest): void {
    const value = request.value ?? 0n;
    if (value > 0n) {
      this.tokens.transfer(NATIVE_CURRENCY, request.from, request.to, value);
    }
  }

  private checkpoint(tx: TxContext): () => void {
    const restorers = this.participants.map((take) => take());
    const pendingLength = tx.pending.length;
    return () => {
      for (const restore of restorers) restore();
      tx.pending.length = pendingLength;
    };
  }

  private commit(tx: TxContext): EventLog[] {
    const base = this.committed.length;
    const logs = tx.pending.map((log, i) => ({
      ...log,
      txHash: tx.txHash,
      logIndex: base + i,
    }));
    this.committed.push(...logs);
    return logs;
  }
}
