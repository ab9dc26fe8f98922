/**
 * @tradevault/chain-client: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Chains are given as a JSON array in `CHAINS`.
 */

import { isAddress } from "viem";
import { z } from "zod";
import { isBytes32 } from "@tradevault/types";
import type { Address, Hex } from "@tradevault/types";
import { ConfigError } from "./types.js";

// =============================================================================
// Primitives
// =============================================================================

const AddressSchema = z.custom<Address>(
  (value) => typeof value === "string" && isAddress(value, { strict: false }),
  { message: "Expected a 20-byte hex address" },
);

const PrivateKeySchema = z.custom<Hex>(
  (value) => isBytes32(value),
  { message: "Expected a 32-byte hex private key" },
);

// =============================================================================
// Schema
// =============================================================================

export const ChainConfigSchema = z.object({
  chainId: z.number().int().positive(),
  name: z.string().min(1),
  rpcUrl: z.string().url(),
  interactionAddress: AddressSchema,
  feederAddress: AddressSchema,
  usdtAddress: AddressSchema,
  swapperAddress: AddressSchema,
});

export type ChainConfig = z.infer<typeof ChainConfigSchema>;

const ChainsSchema = z
  .string()
  .default("[]")
  .transform((raw, ctx): unknown => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "CHAINS is not valid JSON" });
      return z.NEVER;
    }
  })
  .pipe(
    z.array(ChainConfigSchema).superRefine((chains, ctx) => {
      const seen = new Set<number>();
      for (const chain of chains) {
        if (seen.has(chain.chainId)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate chainId ${chain.chainId}` });
        }
        seen.add(chain.chainId);
      }
    }),
  );

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Signing
  PRIVATE_KEY: PrivateKeySchema,
  TRIGGER_PRIVATE_KEY: PrivateKeySchema.optional(),

  // Submission
  TX_TIMEOUT_MS: z.coerce.number().int().min(1).default(15_000),
  TX_POLL_INTERVAL_MS: z.coerce.number().int().min(1).default(1_000),
  RPC_TIMEOUT_MS: z.coerce.number().int().min(1).default(30_000),
  GAS_PRICE_MULTIPLIER: z.coerce.number().min(1).default(1.1),
  MULTISWAP_GAS_MULTIPLIER: z.coerce.number().min(1).default(1.2),

  CHAINS: ChainsSchema,
});

export type ClientConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {ConfigError} listing every invalid or missing variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ClientConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return result.data;
}
