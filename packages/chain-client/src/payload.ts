/**
 * Swap payload building.
 *
 * The trigger signs keccak256(innerCallData) directly (no message
 * prefix). The result is packed in the exact wire format the vault
 * verifies.
 */

import { keccak256 } from "viem";
import { sign } from "viem/accounts";
import { encodeInstructionPayload, encodeSwapInstruction } from "@tradevault/vault";
import type { SwapInstruction } from "@tradevault/vault";
import type { Address, Hex } from "@tradevault/types";

export { encodeSwapInstruction };

/**
 * One leg of a multiSwap batch. Without `swapper`, the chain's
 * configured swapper is used.
 */
export interface SwapLeg {
  readonly swapper?: Address;
  readonly tokenIn: Address;
  readonly tokenOut: Address;
  readonly amountIn: bigint;
  /** Signed instruction payload, see signInstructionPayload */
  readonly payload: Hex;
}

export function hashCallData(innerCallData: Hex): Hex {
  return keccak256(innerCallData);
}

export async function signInstructionPayload(innerCallData: Hex, triggerKey: Hex): Promise<Hex> {
  const digest = hashCallData(innerCallData);
  const signature = await sign({ hash: digest, privateKey: triggerKey, to: "hex" });
  return encodeInstructionPayload({ digest, signature, innerCallData });
}

export function encodeSwapLeg(leg: SwapLeg, defaultSwapper: Address): Hex {
  const instruction: SwapInstruction = {
    swapper: leg.swapper ?? defaultSwapper,
    tokenIn: leg.tokenIn,
    tokenOut: leg.tokenOut,
    amountIn: leg.amountIn,
    payload: leg.payload,
  };
  return encodeSwapInstruction(instruction);
}
