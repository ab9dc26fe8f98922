/**
 * SwapExecutor: dual-authorized swaps through arbitrary swapper contracts.
 *
 * A swap needs two approvals: the manager who submits it (checked by the
 * vault entry point) and the trigger, whose signature over the inner
 * call data travels inside the instruction payload.
 *
 * Trust boundary: `tokenIn`, `tokenOut` and `amountIn` are not checked
 * against what the inner call actually does. The signed call data is the
 * only source of truth. Nothing on-chain records consumed digests, so
 * replay safety belongs to the signer (e.g. a nonce the swapper checks).
 */

import { isAddressEqual, keccak256, zeroAddress } from "viem";
import type { Hex } from "@tradevault/types";
import { decodeInstructionPayload, decodeSwapInstruction } from "./instruction.js";
import { decodeRevert } from "./revert-decoder.js";
import { recoverSigner } from "./signature.js";
import { VaultError } from "./types.js";
import type { SwapInstruction, VaultContext } from "./types.js";

export class SwapExecutor {
  constructor(private readonly ctx: VaultContext) {}

  /**
   * Execute one instruction and return the tokenOut balance delta.
   */
  async swap(instruction: SwapInstruction): Promise<bigint> {
    const { address, chain, access } = this.ctx;
    const { swapper, tokenIn, tokenOut, amountIn } = instruction;

    chain.tokens.approve(tokenIn, address, swapper, this.ctx.settings().swapApprovalAmount);
    const balanceBefore = chain.tokens.balanceOf(tokenOut, address);

    const { digest, signature, innerCallData } = decodeInstructionPayload(instruction.payload);

    if (keccak256(innerCallData) !== digest.toLowerCase()) {
      throw new VaultError("HASH_MISMATCH", `Digest ${digest} does not match the call data hash`);
    }

    const signer = await recoverSigner(digest, signature);
    if (isAddressEqual(signer, zeroAddress) || !isAddressEqual(signer, access.trigger)) {
      throw new VaultError("INVALID_SIGNATURE", "Instruction is not signed by the trigger");
    }

    const result = await chain.call(address, swapper, innerCallData);
    if (!result.success) {
      const reason = decodeRevert(result.returnData);
      throw new VaultError("SWAP_EXECUTION_FAILED", `Swap failed: ${reason}`, reason);
    }

    const balanceAfter = chain.tokens.balanceOf(tokenOut, address);
    if (balanceAfter < balanceBefore) {
      throw new VaultError(
        "ARITHMETIC_UNDERFLOW",
        `tokenOut balance decreased from ${balanceBefore} to ${balanceAfter}`,
      );
    }
    const amountOut = balanceAfter - balanceBefore;

    chain.emit(address, { name: "SwapSuccess", tokenIn, tokenOut, amountIn, amountOut });
    return amountOut;
  }

  /**
   * Decode and execute each instruction in order. The first failure
   * propagates; the enclosing transaction discards everything before it.
   */
  async multiSwap(instructions: readonly Hex[]): Promise<readonly bigint[]> {
    const amounts: bigint[] = [];
    for (const data of instructions) {
      amounts.push(await this.swap(decodeSwapInstruction(data)));
    }
    return amounts;
  }
}
