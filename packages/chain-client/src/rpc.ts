/**
 * viem-backed ChainRpc.
 *
 * One public client for reads and one wallet client for sends, both over
 * HTTP to the chain's configured node.
 */

import { createPublicClient, createWalletClient, defineChain, http } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import type { Hex } from "@tradevault/types";
import type { ChainConfig } from "./config.js";
import type { ChainRpc } from "./types.js";

export interface ViemRpcOptions {
  /** HTTP request timeout. Default: 30000 */
  readonly timeoutMs?: number;
}

export function createViemRpc(
  chain: ChainConfig,
  privateKey: Hex,
  options: ViemRpcOptions = {},
): ChainRpc {
  const definition = defineChain({
    id: chain.chainId,
    name: chain.name,
    nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
    rpcUrls: { default: { http: [chain.rpcUrl] } },
  });
  const transport = http(chain.rpcUrl, { timeout: options.timeoutMs ?? 30_000 });
  const account = privateKeyToAccount(privateKey);

  const publicClient = createPublicClient({ chain: definition, transport });
  const walletClient = createWalletClient({ account, chain: definition, transport });

  return {
    chainId: chain.chainId,
    account: account.address,

    getBlockNumber: () => publicClient.getBlockNumber(),

    getPendingNonce: () =>
      publicClient.getTransactionCount({ address: account.address, blockTag: "pending" }),

    getGasPrice: () => publicClient.getGasPrice(),

    estimateGas: ({ to, data, value }) =>
      publicClient.estimateGas({ account: account.address, to, data, value }),

    call: async ({ to, data }) => {
      const result = await publicClient.call({ to, data });
      return result.data ?? "0x";
    },

    sendTransaction: (tx) =>
      walletClient.sendTransaction({
        to: tx.to,
        data: tx.data,
        value: tx.value,
        gas: tx.gas,
        gasPrice: tx.gasPrice,
        nonce: tx.nonce,
      }),

    getTransactionReceipt: async (hash) => {
      const receipt = await publicClient.getTransactionReceipt({ hash });
      return {
        transactionHash: receipt.transactionHash,
        status: receipt.status,
        blockNumber: receipt.blockNumber,
        gasUsed: receipt.gasUsed,
      };
    },
  };
}
