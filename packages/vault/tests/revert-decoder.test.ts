/**
 * Tests for decodeRevert: revert reason extraction.
 */

import { describe, it, expect } from "vitest";
import { concat, encodeAbiParameters, size } from "viem";
import type { Hex } from "@tradevault/types";
import {
  decodeRevert,
  encodeRevertReason,
  ERROR_STRING_SELECTOR,
  SILENT_REVERT_MESSAGE,
} from "../src/revert-decoder.js";

describe("decodeRevert", () => {
  it("decodes a standard Error(string) payload", () => {
    expect(decodeRevert(encodeRevertReason("insufficient output amount"))).toBe("insufficient output amount");
  });

  it("decodes the empty reason (exactly 68 bytes)", () => {
    const data = encodeRevertReason("");
    expect(size(data)).toBe(68);
    expect(decodeRevert(data)).toBe("");
  });

  it("returns the silent message for empty return data", () => {
    expect(decodeRevert("0x")).toBe(SILENT_REVERT_MESSAGE);
  });

  it("returns the silent message for anything shorter than 68 bytes", () => {
    const full = encodeRevertReason("");
    const truncated: Hex = `0x${full.slice(2, 2 + 67 * 2)}`;
    expect(decodeRevert(truncated)).toBe(SILENT_REVERT_MESSAGE);
    expect(decodeRevert(ERROR_STRING_SELECTOR)).toBe(SILENT_REVERT_MESSAGE);
  });

  it("returns the silent message when the string offset points out of bounds", () => {
    const data = concat([
      "0xdeadbeef",
      `0x${"ff".repeat(32)}`,
      `0x${"00".repeat(32)}`,
    ]);
    expect(decodeRevert(data)).toBe("Transaction reverted silently");
  });

  it("does not check the selector", () => {
    const data = concat(["0x12345678", encodeAbiParameters([{ type: "string" }], ["custom"])]);
    expect(decodeRevert(data)).toBe("custom");
  });
});

describe("encodeRevertReason", () => {
  it("prefixes the Error(string) selector", () => {
    expect(encodeRevertReason("x").slice(0, 10)).toBe(ERROR_STRING_SELECTOR);
  });
});
