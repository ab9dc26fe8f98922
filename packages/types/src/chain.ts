/**
 * Chain Types
 *
 * EVM primitives shared by the vault model and the off-chain client.
 *
 * Rules:
 * - Addresses and byte strings are 0x-prefixed hex
 * - Amounts are bigint base units (no floating point)
 * - Chain IDs are the numeric EIP-155 identifiers
 */

/**
 * 0x-prefixed hex string of arbitrary length.
 */
export type Hex = `0x${string}`;

/**
 * 20-byte account or contract address.
 */
export type Address = `0x${string}`;

/**
 * EIP-155 chain identifier (1 for Ethereum mainnet, 42161 for Arbitrum One).
 */
export type ChainId = number;

/**
 * Transaction hash on a specific chain.
 */
export type TxHash = `0x${string}`;
