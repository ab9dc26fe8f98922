/**
 * Retrying idempotent RPC reads.
 *
 * Block number, pending nonce and gas price reads are safe to repeat,
 * so transient transport failures (timeouts, 429s, dropped sockets) are
 * retried with capped exponential backoff. Broadcasts never go through
 * here: a resent transaction can land twice.
 *
 * Also holds the classifiers for what a node says when it refuses a
 * transaction.
 */

import type { Logger } from "pino";
import { RetryExhaustedError } from "./types.js";

export interface RetryPolicy {
  /** Total tries, the first one included */
  readonly attempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  /** Upper bound of the random spread added to each delay */
  readonly jitterMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  attempts: 3,
  initialDelayMs: 500,
  maxDelayMs: 5_000,
  jitterMs: 100,
};

export interface RetryOptions {
  readonly policy?: RetryPolicy;
  /** Default: isRetryableRpcError */
  readonly isRetryable?: (error: unknown) => boolean;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
  readonly logger?: Logger;
  /** Names the read in logs and in RetryExhaustedError */
  readonly label?: string;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Delay before retry number `retry` (0 for the first retry).
 */
export function backoffDelay(
  retry: number,
  policy: RetryPolicy,
  random: () => number = Math.random,
): number {
  const delay = policy.initialDelayMs * 2 ** retry + random() * policy.jitterMs;
  return Math.min(delay, policy.maxDelayMs);
}

/**
 * Run `read` until it succeeds, fails with a non-retryable error, or
 * runs out of attempts.
 *
 * @throws {RetryExhaustedError} wrapping the last failure
 */
export async function readWithRetry<T>(
  read: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const isRetryable = options.isRetryable ?? isRetryableRpcError;
  const sleepFn = options.sleep ?? sleep;
  const label = options.label ?? "RPC read";

  for (let attempt = 1; ; attempt++) {
    try {
      return await read();
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }
      if (attempt >= policy.attempts) {
        throw new RetryExhaustedError(label, attempt, error);
      }
      const delayMs = backoffDelay(attempt - 1, policy, options.random);
      options.logger?.debug({ attempt, delayMs, err: errorMessage(error) }, `${label} failed, retrying`);
      await sleepFn(delayMs);
    }
  }
}

// =============================================================================
// Node error classification
// =============================================================================

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function messageOf(error: unknown): string | undefined {
  return error instanceof Error ? error.message.toLowerCase() : undefined;
}

// Refusals the node will repeat for the same request
const PERMANENT_PATTERNS = [
  "execution reverted",
  "insufficient funds",
  "nonce too low",
  "replacement transaction underpriced",
  "already known",
  "known transaction",
  "invalid sender",
  "intrinsic gas too low",
];

const NONCE_COLLISION_PATTERNS = ["nonce too low", "replacement transaction underpriced"];

const ALREADY_KNOWN_PATTERNS = ["already known", "known transaction"];

/**
 * Transport and rate-limit failures are retryable. Non-Error values are
 * treated as transport failures.
 */
export function isRetryableRpcError(error: unknown): boolean {
  const msg = messageOf(error);
  if (msg === undefined) return true;
  return !PERMANENT_PATTERNS.some((pattern) => msg.includes(pattern));
}

/**
 * The nonce was stale: another transaction already took it.
 */
export function isNonceCollisionError(error: unknown): boolean {
  const msg = messageOf(error);
  return msg !== undefined && NONCE_COLLISION_PATTERNS.some((pattern) => msg.includes(pattern));
}

/**
 * The node already holds this exact signed transaction, usually from an
 * earlier send whose response was lost.
 */
export function isAlreadyKnownError(error: unknown): boolean {
  const msg = messageOf(error);
  return msg !== undefined && ALREADY_KNOWN_PATTERNS.some((pattern) => msg.includes(pattern));
}
