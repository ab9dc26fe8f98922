/**
 * Tests for swap and multiSwap: the dual-authorized swap path.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { keccak256, maxUint256, toHex } from "viem";
import type { Hex } from "@tradevault/types";
import { encodeInstructionPayload, encodeSwapInstruction } from "../src/instruction.js";
import { SILENT_REVERT_MESSAGE } from "../src/revert-decoder.js";
import { encodeSwapCall } from "../src/sim/fixed-rate-swapper.js";
import type { SwapInstruction } from "../src/types.js";
import {
  buildInstruction,
  createTestEnv,
  expectVaultError,
  MANAGER,
  OTHER_KEY,
  OUTSIDER,
  signedPayload,
  SWAPPER,
  SWAPPER_WETH,
  USDT,
  usdtToWeth,
  VAULT_USDT,
  WETH,
} from "./setup.js";
import type { TestEnv } from "./setup.js";

describe("swap", () => {
  let env: TestEnv;

  beforeEach(async () => {
    env = await createTestEnv();
  });

  function balances() {
    const { chain, addresses } = env;
    return {
      vaultUsdt: chain.tokens.balanceOf(USDT, addresses.vault),
      vaultWeth: chain.tokens.balanceOf(WETH, addresses.vault),
      swapperWeth: chain.tokens.balanceOf(WETH, SWAPPER),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Success
  // ───────────────────────────────────────────────────────────────────────

  it("executes the signed call and returns the tokenOut delta", async () => {
    const instruction = await buildInstruction(usdtToWeth(100n));
    const receipt = await env.vault.swap({ from: MANAGER }, instruction);

    expect(receipt.result).toBe(200n);
    expect(balances()).toEqual({
      vaultUsdt: VAULT_USDT - 100n,
      vaultWeth: 200n,
      swapperWeth: SWAPPER_WETH - 200n,
    });
  });

  it("emits SwapSuccess with the advisory amountIn and the measured amountOut", async () => {
    const instruction = await buildInstruction(usdtToWeth(100n), { amountIn: 999n });
    const receipt = await env.vault.swap({ from: MANAGER }, instruction);

    expect(receipt.result).toBe(200n);
    expect(receipt.logs.map((log) => log.event)).toEqual([
      { name: "SwapSuccess", tokenIn: USDT, tokenOut: WETH, amountIn: 999n, amountOut: 200n },
    ]);
    expect(receipt.logs[0]?.address).toBe(env.addresses.vault);
  });

  it("grants the swapper an unlimited allowance by default", async () => {
    await env.vault.swap({ from: MANAGER }, await buildInstruction(usdtToWeth(100n)));
    expect(env.chain.tokens.allowance(USDT, env.addresses.vault, SWAPPER)).toBe(maxUint256);
  });

  it("uses the configured approval amount", async () => {
    const bounded = await createTestEnv({ swapApprovalAmount: 100n });
    await bounded.vault.swap({ from: MANAGER }, await buildInstruction(usdtToWeth(100n)));
    expect(bounded.chain.tokens.allowance(USDT, bounded.addresses.vault, SWAPPER)).toBe(0n);
  });

  it("fails when the swapper pulls more than the configured approval", async () => {
    const bounded = await createTestEnv({ swapApprovalAmount: 100n });
    const error = await expectVaultError(
      bounded.vault.swap({ from: MANAGER }, await buildInstruction(usdtToWeth(150n))),
      "SWAP_EXECUTION_FAILED",
    );
    expect(error.reason).toBe("insufficient allowance");
  });

  it("succeeds with a zero delta when the swapper has no code", async () => {
    const instruction = await buildInstruction(usdtToWeth(100n), { swapper: OUTSIDER });
    const receipt = await env.vault.swap({ from: MANAGER }, instruction);

    expect(receipt.result).toBe(0n);
    expect(balances().vaultUsdt).toBe(VAULT_USDT);
  });

  // ───────────────────────────────────────────────────────────────────────
  // Authorization
  // ───────────────────────────────────────────────────────────────────────

  it("rejects non-managers", async () => {
    const instruction = await buildInstruction(usdtToWeth(100n));
    await expectVaultError(env.vault.swap({ from: OUTSIDER }, instruction), "UNAUTHORIZED");
  });

  it("fails with HASH_MISMATCH when the digest does not cover the call data", async () => {
    const signed = await buildInstruction(usdtToWeth(100n));
    const innerCallData = encodeSwapCall(usdtToWeth(500n));
    const digest = keccak256(toHex("something else"));
    const payload = encodeInstructionPayload({ digest, signature: `0x${"00".repeat(65)}`, innerCallData });

    await expectVaultError(env.vault.swap({ from: MANAGER }, { ...signed, payload }), "HASH_MISMATCH");
  });

  it("checks the hash before the signature", async () => {
    const innerCallData = encodeSwapCall(usdtToWeth(100n));
    const payload = encodeInstructionPayload({
      digest: keccak256("0x00"),
      signature: "0x",
      innerCallData,
    });
    const instruction: SwapInstruction = { swapper: SWAPPER, tokenIn: USDT, tokenOut: WETH, amountIn: 100n, payload };

    await expectVaultError(env.vault.swap({ from: MANAGER }, instruction), "HASH_MISMATCH");
  });

  it("fails with INVALID_SIGNATURE when another key signed", async () => {
    const instruction = await buildInstruction(usdtToWeth(100n), { privateKey: OTHER_KEY });
    await expectVaultError(env.vault.swap({ from: MANAGER }, instruction), "INVALID_SIGNATURE");
  });

  it("fails with INVALID_SIGNATURE when the signature is malformed", async () => {
    const innerCallData = encodeSwapCall(usdtToWeth(100n));
    const payload = encodeInstructionPayload({
      digest: keccak256(innerCallData),
      signature: `0x${"ab".repeat(64)}`,
      innerCallData,
    });
    const instruction: SwapInstruction = { swapper: SWAPPER, tokenIn: USDT, tokenOut: WETH, amountIn: 100n, payload };

    await expectVaultError(env.vault.swap({ from: MANAGER }, instruction), "INVALID_SIGNATURE");
  });

  it("fails with MALFORMED_INSTRUCTION when the payload cannot be decoded", async () => {
    const signed = await buildInstruction(usdtToWeth(100n));
    await expectVaultError(
      env.vault.swap({ from: MANAGER }, { ...signed, payload: "0x1234" }),
      "MALFORMED_INSTRUCTION",
    );
  });

  // ───────────────────────────────────────────────────────────────────────
  // Target failure
  // ───────────────────────────────────────────────────────────────────────

  it("surfaces the swapper's revert reason", async () => {
    const instruction = await buildInstruction(usdtToWeth(100n, 201n));
    const error = await expectVaultError(env.vault.swap({ from: MANAGER }, instruction), "SWAP_EXECUTION_FAILED");
    expect(error.reason).toBe("insufficient output amount");
  });

  it("falls back to the silent message when the swapper reverts without data", async () => {
    const instruction: SwapInstruction = {
      swapper: SWAPPER,
      tokenIn: USDT,
      tokenOut: WETH,
      amountIn: 100n,
      payload: await signedPayload("0xdeadbeef"),
    };
    const error = await expectVaultError(env.vault.swap({ from: MANAGER }, instruction), "SWAP_EXECUTION_FAILED");
    expect(error.reason).toBe(SILENT_REVERT_MESSAGE);
  });

  it("leaves no trace when the swap fails", async () => {
    const instruction = await buildInstruction(usdtToWeth(100n, 201n));
    const logsBefore = env.chain.logs.length;

    await expectVaultError(env.vault.swap({ from: MANAGER }, instruction), "SWAP_EXECUTION_FAILED");

    expect(balances()).toEqual({ vaultUsdt: VAULT_USDT, vaultWeth: 0n, swapperWeth: SWAPPER_WETH });
    expect(env.chain.tokens.allowance(USDT, env.addresses.vault, SWAPPER)).toBe(0n);
    expect(env.chain.logs).toHaveLength(logsBefore);
  });

  it("fails when the tokenOut balance decreases", async () => {
    const lossy = await createTestEnv({ rate: { numerator: 1n, denominator: 2n } });
    const instruction = await buildInstruction({ tokenIn: USDT, tokenOut: USDT, amountIn: 100n, minAmountOut: 0n });
    await expectVaultError(lossy.vault.swap({ from: MANAGER }, instruction), "ARITHMETIC_UNDERFLOW");
    expect(lossy.chain.tokens.balanceOf(USDT, lossy.addresses.vault)).toBe(VAULT_USDT);
  });

  // ───────────────────────────────────────────────────────────────────────
  // Re-entrancy
  // ───────────────────────────────────────────────────────────────────────

  it("rejects a swapper that calls back into the vault", async () => {
    const holder: { env?: TestEnv } = {};
    const inner = await buildInstruction(usdtToWeth(1n));
    const reentrant = await createTestEnv({
      beforeSwap: async () => {
        if (holder.env) {
          await holder.env.vault.swap({ from: MANAGER }, inner);
        }
      },
    });
    holder.env = reentrant;

    const error = await expectVaultError(
      reentrant.vault.swap({ from: MANAGER }, await buildInstruction(usdtToWeth(100n))),
      "SWAP_EXECUTION_FAILED",
    );
    expect(error.reason).toBe("Re-entrant call into the vault");
    expect(reentrant.chain.tokens.balanceOf(USDT, reentrant.addresses.vault)).toBe(VAULT_USDT);
  });
});

// =============================================================================
// multiSwap
// =============================================================================

describe("multiSwap", () => {
  let env: TestEnv;

  beforeEach(async () => {
    env = await createTestEnv();
  });

  async function encoded(amountIn: bigint, minAmountOut = 0n): Promise<Hex> {
    return encodeSwapInstruction(await buildInstruction(usdtToWeth(amountIn, minAmountOut)));
  }

  it("executes every instruction in order", async () => {
    const receipt = await env.vault.multiSwap({ from: MANAGER }, [await encoded(100n), await encoded(200n)]);

    expect(receipt.result).toEqual([200n, 400n]);
    expect(receipt.logs.map((log) => log.event.name)).toEqual(["SwapSuccess", "SwapSuccess"]);
    expect(env.chain.tokens.balanceOf(WETH, env.addresses.vault)).toBe(600n);
    expect(env.chain.tokens.balanceOf(USDT, env.addresses.vault)).toBe(VAULT_USDT - 300n);
  });

  it("accepts an empty batch", async () => {
    const receipt = await env.vault.multiSwap({ from: MANAGER }, []);
    expect(receipt.result).toEqual([]);
    expect(receipt.logs).toEqual([]);
  });

  it("is all-or-nothing: three valid instructions then a hash mismatch changes nothing", async () => {
    const bad = await buildInstruction(usdtToWeth(100n));
    const mismatched = encodeSwapInstruction({
      ...bad,
      payload: encodeInstructionPayload({
        digest: keccak256(toHex("not the call data")),
        signature: `0x${"00".repeat(65)}`,
        innerCallData: encodeSwapCall(usdtToWeth(100n)),
      }),
    });
    const logsBefore = env.chain.logs.length;

    await expectVaultError(
      env.vault.multiSwap({ from: MANAGER }, [
        await encoded(100n),
        await encoded(100n),
        await encoded(100n),
        mismatched,
      ]),
      "HASH_MISMATCH",
    );

    expect(env.chain.tokens.balanceOf(USDT, env.addresses.vault)).toBe(VAULT_USDT);
    expect(env.chain.tokens.balanceOf(WETH, env.addresses.vault)).toBe(0n);
    expect(env.chain.tokens.balanceOf(WETH, SWAPPER)).toBe(SWAPPER_WETH);
    expect(env.chain.logs).toHaveLength(logsBefore);
  });

  it("fails with the first failing element's reason", async () => {
    const error = await expectVaultError(
      env.vault.multiSwap({ from: MANAGER }, [await encoded(100n), await encoded(100n, 10_000n)]),
      "SWAP_EXECUTION_FAILED",
    );
    expect(error.reason).toBe("insufficient output amount");
  });

  it("fails with MALFORMED_INSTRUCTION on an undecodable element", async () => {
    await expectVaultError(
      env.vault.multiSwap({ from: MANAGER }, [await encoded(100n), "0x1234"]),
      "MALFORMED_INSTRUCTION",
    );
    expect(env.chain.tokens.balanceOf(WETH, env.addresses.vault)).toBe(0n);
  });

  it("rejects non-managers", async () => {
    await expectVaultError(env.vault.multiSwap({ from: OUTSIDER }, [await encoded(1n)]), "UNAUTHORIZED");
  });
});
