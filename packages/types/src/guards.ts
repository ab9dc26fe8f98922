/**
 * Runtime Type Guards
 *
 * Shape checks for the shared hex types. Used where a value must be an
 * exact 32-byte word: signature digests, margin referral tags and
 * private keys in configuration.
 */

import type { Hex } from "./chain.js";

const BYTES32_RE = /^0x[0-9a-fA-F]{64}$/;

export function isBytes32(value: unknown): value is Hex {
  return typeof value === "string" && BYTES32_RE.test(value);
}
