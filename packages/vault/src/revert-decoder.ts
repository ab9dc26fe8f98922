/**
 * Revert reason decoding.
 *
 * Turns raw revert data from a failed call into a human-readable reason.
 * Never throws: anything that is not a decodable Error(string) payload
 * yields SILENT_REVERT_MESSAGE.
 */

import { concat, decodeAbiParameters, encodeAbiParameters, size, slice } from "viem";
import type { Hex } from "@tradevault/types";

/** Selector of Error(string) */
export const ERROR_STRING_SELECTOR: Hex = "0x08c379a0";

export const SILENT_REVERT_MESSAGE = "Transaction reverted silently";

// selector + offset word + length word
const MIN_ERROR_STRING_SIZE = 68;

export function decodeRevert(returnData: Hex): string {
  if (size(returnData) < MIN_ERROR_STRING_SIZE) {
    return SILENT_REVERT_MESSAGE;
  }
  try {
    const [reason] = decodeAbiParameters([{ type: "string" }], slice(returnData, 4));
    return reason;
  } catch {
    return SILENT_REVERT_MESSAGE;
  }
}

export function encodeRevertReason(reason: string): Hex {
  return concat([ERROR_STRING_SELECTOR, encodeAbiParameters([{ type: "string" }], [reason])]);
}
