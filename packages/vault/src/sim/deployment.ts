/**
 * Wires a complete in-process deployment: host chain, lending pool,
 * native gateway, margin routers and an uninitialized vault.
 */

import type { Address } from "@tradevault/types";
import { InMemoryChain } from "../in-memory-chain.js";
import { TradeVault } from "../trade-vault.js";
import { InMemoryLendingPool } from "./in-memory-lending-pool.js";
import { InMemoryMarginRouter, InMemoryPositionRouter } from "./in-memory-margin-router.js";
import { InMemoryNativeGateway } from "./in-memory-native-gateway.js";

export interface DeploymentAddresses {
  readonly vault: Address;
  readonly lendingPool: Address;
  readonly nativeGateway: Address;
  readonly wrappedNative: Address;
  readonly marginRouter: Address;
  readonly marginPositionRouter: Address;
}

export const DEFAULT_DEPLOYMENT_ADDRESSES: DeploymentAddresses = {
  vault: "0x00000000000000000000000000000000000a0001",
  lendingPool: "0x00000000000000000000000000000000000b0001",
  nativeGateway: "0x00000000000000000000000000000000000b0002",
  wrappedNative: "0x00000000000000000000000000000000000b0003",
  marginRouter: "0x00000000000000000000000000000000000c0001",
  marginPositionRouter: "0x00000000000000000000000000000000000c0002",
};

export interface SimulatedDeployment {
  readonly chain: InMemoryChain;
  readonly vault: TradeVault;
  readonly lendingPool: InMemoryLendingPool;
  readonly nativeGateway: InMemoryNativeGateway;
  readonly marginRouter: InMemoryMarginRouter;
  readonly positionRouter: InMemoryPositionRouter;
  readonly addresses: DeploymentAddresses;
}

export interface DeploymentOptions {
  readonly addresses?: Partial<DeploymentAddresses>;
  /** Position router execution fee in wei */
  readonly minExecutionFee?: bigint;
}

export function deploySimulatedVault(options: DeploymentOptions = {}): SimulatedDeployment {
  const addresses: DeploymentAddresses = { ...DEFAULT_DEPLOYMENT_ADDRESSES, ...options.addresses };
  const chain = new InMemoryChain();

  const lendingPool = new InMemoryLendingPool(addresses.lendingPool, chain.tokens);
  lendingPool.listReserve(addresses.wrappedNative);
  chain.register(lendingPool);

  const nativeGateway = new InMemoryNativeGateway(
    addresses.nativeGateway,
    chain.tokens,
    lendingPool,
    addresses.wrappedNative,
  );

  const marginRouter = new InMemoryMarginRouter(addresses.marginRouter);
  chain.register(marginRouter);
  const positionRouter = new InMemoryPositionRouter(
    addresses.marginPositionRouter,
    options.minExecutionFee ?? 100_000_000_000_000n,
  );

  const vault = new TradeVault(addresses.vault, chain, {
    lendingPool,
    lendingDataProvider: lendingPool,
    nativeGateway,
    marginRouter,
    marginPositionRouter: positionRouter,
  });

  return { chain, vault, lendingPool, nativeGateway, marginRouter, positionRouter, addresses };
}
