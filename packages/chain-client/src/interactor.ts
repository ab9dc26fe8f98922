/**
 * Interactor: Orchestration operations against deployed vaults.
 *
 * Every chain-bound operation resolves its chain through the registry
 * first, so an unknown chain id fails with ChainNotFoundError before
 * any RPC traffic. Writes go through the chain's ChainSubmitter and
 * resolve once the transaction is mined.
 */

import {
  decodeFunctionResult,
  encodeFunctionData,
  formatUnits,
  getAddress,
} from "viem";
import type { Logger } from "pino";
import type { Address, ChainId, Hex } from "@tradevault/types";
import {
  ARBITRAGE_ABI,
  FEEDER_ABI,
  GMX_READER_ABI,
  INTERACTION_ABI,
  TRADE_ABI,
} from "./abi.js";
import type { ClientConfig } from "./config.js";
import { encodeSwapLeg, signInstructionPayload } from "./payload.js";
import type { SwapLeg } from "./payload.js";
import type { ChainRegistry } from "./registry.js";
import { ChainClientError } from "./types.js";
import type { TxReceiptSummary } from "./types.js";

export const DEFAULT_MULTISWAP_GAS_MULTIPLIER = 1.2;

/** Position sizes are reported with this many decimals. */
export const POSITION_DECIMALS = 18;

export interface InteractorOptions {
  /** Applied to the gas estimate of multiSwap. Default: 1.2 */
  readonly multiSwapGasMultiplier?: number;
  /** Key that co-signs swap payloads; required by signSwapPayload */
  readonly triggerKey?: Hex;
  readonly logger?: Logger;
}

export interface UserData {
  readonly totalDeposit: bigint;
  readonly totalWithdrawals: bigint;
  readonly tokenAmount: bigint;
  readonly pendingWithdrawalTokens: bigint;
}

export interface GmxPositionQuery {
  readonly readerAddress: Address;
  readonly vaultAddress: Address;
  readonly tradeAddress: Address;
  readonly collateralTokens: readonly Address[];
  readonly indexTokens: readonly Address[];
  readonly isLong: readonly boolean[];
}

export class Interactor {
  private readonly multiSwapGasMultiplier: number;
  private readonly triggerKey: Hex | undefined;
  private readonly log: Logger | undefined;

  constructor(
    private readonly registry: ChainRegistry,
    options: InteractorOptions = {},
  ) {
    this.multiSwapGasMultiplier = options.multiSwapGasMultiplier ?? DEFAULT_MULTISWAP_GAS_MULTIPLIER;
    this.triggerKey = options.triggerKey;
    this.log = options.logger;
  }

  /**
   * Co-sign an inner swapper call as the trigger. The result is the
   * `payload` of a SwapLeg.
   */
  async signSwapPayload(innerCallData: Hex): Promise<Hex> {
    if (this.triggerKey === undefined) {
      throw new ChainClientError("TRIGGER_KEY_MISSING", "No trigger key configured (TRIGGER_PRIVATE_KEY)");
    }
    return signInstructionPayload(innerCallData, this.triggerKey);
  }

  // ─── Writes ─────────────────────────────────────────────────────────

  /**
   * Pack every leg as a swap instruction and submit them as one batch.
   */
  async multiSwap(
    chainId: ChainId,
    tradeAddress: Address,
    legs: readonly SwapLeg[],
  ): Promise<TxReceiptSummary> {
    const { config, submitter } = this.registry.get(chainId);
    const instructions = legs.map((leg) => encodeSwapLeg(leg, config.swapperAddress));

    this.log?.info({ chainId, tradeAddress, legs: legs.length }, "Submitting multiSwap");
    return submitter.submitAndWait({
      to: tradeAddress,
      data: encodeFunctionData({ abi: TRADE_ABI, functionName: "multiSwap", args: [instructions] }),
      gasMultiplier: this.multiSwapGasMultiplier,
    });
  }

  async aaveWithdraw(
    chainId: ChainId,
    tradeAddress: Address,
    token: Address,
    amount: bigint,
  ): Promise<TxReceiptSummary> {
    const { submitter } = this.registry.get(chainId);

    this.log?.info({ chainId, tradeAddress, token, amount: amount.toString() }, "Submitting aaveWithdraw");
    return submitter.submitAndWait({
      to: tradeAddress,
      data: encodeFunctionData({ abi: TRADE_ABI, functionName: "aaveWithdraw", args: [token, amount] }),
    });
  }

  /**
   * Settle every user queued for withdrawal from a fund, valued at
   * `tradeTvl`.
   */
  async withdrawMultiple(chainId: ChainId, fundId: bigint, tradeTvl: bigint): Promise<TxReceiptSummary> {
    const { config, rpc, submitter } = this.registry.get(chainId);

    const raw = await rpc.call({
      to: config.feederAddress,
      data: encodeFunctionData({ abi: FEEDER_ABI, functionName: "userWaitingForWithdrawal", args: [fundId] }),
    });
    const users = decodeFunctionResult({ abi: FEEDER_ABI, functionName: "userWaitingForWithdrawal", data: raw });

    this.log?.info({ chainId, fundId: fundId.toString(), users: users.length }, "Submitting withdrawMultiple");
    return submitter.submitAndWait({
      to: config.interactionAddress,
      data: encodeFunctionData({
        abi: INTERACTION_ABI,
        functionName: "withdrawMultiple",
        args: [fundId, users, tradeTvl],
      }),
    });
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  /**
   * Money-market position sizes as decimal strings. An empty token
   * stands for the chain's USDT.
   */
  async aavePositions(
    chainId: ChainId,
    tradeAddress: Address,
    tokens: readonly string[],
  ): Promise<string[]> {
    const { config, rpc } = this.registry.get(chainId);
    const assets = tokens.map((token) => (token === "" ? config.usdtAddress : getAddress(token)));

    const raw = await rpc.call({
      to: tradeAddress,
      data: encodeFunctionData({ abi: TRADE_ABI, functionName: "getAavePositionSizes", args: [assets] }),
    });
    const sizes = decodeFunctionResult({ abi: TRADE_ABI, functionName: "getAavePositionSizes", data: raw });
    return sizes.map((size) => formatUnits(size, POSITION_DECIMALS));
  }

  async userData(chainId: ChainId, fundId: bigint, user: Address): Promise<UserData> {
    const { config, rpc } = this.registry.get(chainId);

    const raw = await rpc.call({
      to: config.feederAddress,
      data: encodeFunctionData({ abi: FEEDER_ABI, functionName: "getUserData", args: [fundId, user] }),
    });
    const [totalDeposit, totalWithdrawals, tokenAmount, pendingWithdrawalTokens] = decodeFunctionResult({
      abi: FEEDER_ABI,
      functionName: "getUserData",
      data: raw,
    });
    return { totalDeposit, totalWithdrawals, tokenAmount, pendingWithdrawalTokens };
  }

  async gmxPositions(chainId: ChainId, query: GmxPositionQuery): Promise<readonly bigint[]> {
    const { rpc } = this.registry.get(chainId);

    const raw = await rpc.call({
      to: query.readerAddress,
      data: encodeFunctionData({
        abi: GMX_READER_ABI,
        functionName: "getPositions",
        args: [query.vaultAddress, query.tradeAddress, query.collateralTokens, query.indexTokens, query.isLong],
      }),
    });
    return decodeFunctionResult({ abi: GMX_READER_ABI, functionName: "getPositions", data: raw });
  }

  // ─── Unsigned transactions ──────────────────────────────────────────

  /**
   * Calldata for an arbitrage contract batch, for the caller's own
   * wallet to sign. Targets and calls pair up by index.
   */
  getMulticallTx(token: Address, amount: bigint, targets: readonly Address[], txs: readonly Hex[]): Hex {
    if (targets.length !== txs.length) {
      throw new Error(`Expected one call per target, got ${targets.length} targets and ${txs.length} calls`);
    }
    return encodeFunctionData({
      abi: ARBITRAGE_ABI,
      functionName: "multiSwap",
      args: [token, amount, targets, txs],
    });
  }
}

/**
 * Build an Interactor from loaded configuration.
 */
export function createInteractor(
  config: ClientConfig,
  registry: ChainRegistry,
  options: { readonly logger?: Logger } = {},
): Interactor {
  return new Interactor(registry, {
    multiSwapGasMultiplier: config.MULTISWAP_GAS_MULTIPLIER,
    ...(config.TRIGGER_PRIVATE_KEY !== undefined ? { triggerKey: config.TRIGGER_PRIVATE_KEY } : {}),
    ...(options.logger ? { logger: options.logger } : {}),
  });
}
