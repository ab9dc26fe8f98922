/**
 * Chain Registry
 *
 * Holds one connection (config, RPC, submitter) per chain id and is the
 * single entry point the Interactor resolves chains through.
 *
 * Design rules:
 * - Connections are registered, not auto-discovered
 * - Each chain has at most one connection
 * - Multi-chain queries run in parallel
 * - Individual chain failures don't block others
 */

import type { Logger } from "pino";
import type { ChainId, Hex } from "@tradevault/types";
import type { ChainConfig, ClientConfig } from "./config.js";
import { readWithRetry } from "./retry.js";
import { createViemRpc } from "./rpc.js";
import { ChainSubmitter } from "./submitter.js";
import { ChainClientError, ChainNotFoundError } from "./types.js";
import type { ChainRpc } from "./types.js";

export interface ChainConnection {
  readonly config: ChainConfig;
  readonly rpc: ChainRpc;
  readonly submitter: ChainSubmitter;
}

export interface ChainStatus {
  readonly chainId: ChainId;
  readonly name: string;
  readonly blockNumber: bigint;
}

/**
 * Result of a multi-chain operation that may partially fail.
 */
export interface MultiChainResult<T> {
  readonly successes: readonly T[];
  readonly errors: readonly { readonly chainId: ChainId; readonly error: string }[];
}

export class ChainRegistry {
  private readonly connections: Map<ChainId, ChainConnection> = new Map();

  /**
   * Register a connection for a chain.
   * Throws if one is already registered for this chain.
   */
  register(connection: ChainConnection): void {
    const chainId = connection.config.chainId;
    if (this.connections.has(chainId)) {
      throw new ChainClientError(
        "CHAIN_ALREADY_REGISTERED",
        `Chain ${chainId} is already registered`,
      );
    }
    this.connections.set(chainId, connection);
  }

  /**
   * Returns true if a connection was removed.
   */
  unregister(chainId: ChainId): boolean {
    return this.connections.delete(chainId);
  }

  /**
   * @throws {ChainNotFoundError}
   */
  get(chainId: ChainId): ChainConnection {
    const connection = this.connections.get(chainId);
    if (!connection) {
      throw new ChainNotFoundError(chainId);
    }
    return connection;
  }

  has(chainId: ChainId): boolean {
    return this.connections.has(chainId);
  }

  listChains(): readonly ChainId[] {
    return [...this.connections.keys()];
  }

  /**
   * Latest block of every registered chain.
   */
  async getStatusAll(): Promise<MultiChainResult<ChainStatus>> {
    const connections = [...this.connections.values()];
    const results = await Promise.allSettled(
      connections.map(async ({ config, rpc }) => ({
        chainId: config.chainId,
        name: config.name,
        blockNumber: await readWithRetry(() => rpc.getBlockNumber(), { label: "getBlockNumber" }),
      })),
    );

    const successes: ChainStatus[] = [];
    const errors: { readonly chainId: ChainId; readonly error: string }[] = [];
    results.forEach((result, i) => {
      if (result.status === "fulfilled") {
        successes.push(result.value);
        return;
      }
      errors.push({
        chainId: connections[i]?.config.chainId ?? -1,
        error: result.reason instanceof Error ? result.reason.message : String(result.reason),
      });
    });

    return { successes, errors };
  }
}

// =============================================================================
// Factory
// =============================================================================

export interface ChainRegistryOptions {
  readonly logger?: Logger;
  /** Builds the RPC for one chain. Default: createViemRpc */
  readonly createRpc?: (chain: ChainConfig, privateKey: Hex) => ChainRpc;
}

/**
 * Build a registry with one viem-backed connection per configured chain.
 */
export function createChainRegistry(
  config: ClientConfig,
  options: ChainRegistryOptions = {},
): ChainRegistry {
  const createRpc =
    options.createRpc ??
    ((chain: ChainConfig, privateKey: Hex) =>
      createViemRpc(chain, privateKey, { timeoutMs: config.RPC_TIMEOUT_MS }));

  const registry = new ChainRegistry();
  for (const chain of config.CHAINS) {
    const rpc = createRpc(chain, config.PRIVATE_KEY);
    const logger = options.logger?.child({ chainId: chain.chainId });
    const submitter = new ChainSubmitter(rpc, {
      gasPriceMultiplier: config.GAS_PRICE_MULTIPLIER,
      timeoutMs: config.TX_TIMEOUT_MS,
      pollIntervalMs: config.TX_POLL_INTERVAL_MS,
      ...(logger ? { logger } : {}),
    });
    registry.register({ config: chain, rpc, submitter });
    logger?.info({ name: chain.name }, "Chain registered");
  }
  return registry;
}
