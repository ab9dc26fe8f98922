/**
 * Swap instruction wire format.
 *
 * Instruction: abi.encode(address swapper, address tokenIn, address tokenOut, uint256 amountIn, bytes payload)
 * Payload:     abi.encode(bytes32 digest, bytes signature, bytes innerCallData)
 *
 * The same encoding is produced off-chain by the client and consumed
 * by multiSwap.
 */

import { decodeAbiParameters, encodeAbiParameters, parseAbiParameters } from "viem";
import type { Hex } from "@tradevault/types";
import { VaultError } from "./types.js";
import type { InstructionPayload, SwapInstruction } from "./types.js";

export const SWAP_INSTRUCTION_PARAMS = parseAbiParameters(
  "address swapper, address tokenIn, address tokenOut, uint256 amountIn, bytes payload",
);

export const INSTRUCTION_PAYLOAD_PARAMS = parseAbiParameters(
  "bytes32 digest, bytes signature, bytes innerCallData",
);

// =============================================================================
// Instruction
// =============================================================================

export function encodeSwapInstruction(instruction: SwapInstruction): Hex {
  return encodeAbiParameters(SWAP_INSTRUCTION_PARAMS, [
    instruction.swapper,
    instruction.tokenIn,
    instruction.tokenOut,
    instruction.amountIn,
    instruction.payload,
  ]);
}

export function decodeSwapInstruction(data: Hex): SwapInstruction {
  try {
    const [swapper, tokenIn, tokenOut, amountIn, payload] = decodeAbiParameters(SWAP_INSTRUCTION_PARAMS, data);
    return { swapper, tokenIn, tokenOut, amountIn, payload };
  } catch (error) {
    throw new VaultError(
      "MALFORMED_INSTRUCTION",
      `Cannot decode swap instruction: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

// =============================================================================
// Payload
// =============================================================================

export function encodeInstructionPayload(payload: InstructionPayload): Hex {
  return encodeAbiParameters(INSTRUCTION_PAYLOAD_PARAMS, [
    payload.digest,
    payload.signature,
    payload.innerCallData,
  ]);
}

export function decodeInstructionPayload(data: Hex): InstructionPayload {
  try {
    const [digest, signature, innerCallData] = decodeAbiParameters(INSTRUCTION_PAYLOAD_PARAMS, data);
    return { digest, signature, innerCallData };
  } catch (error) {
    throw new VaultError(
      "MALFORMED_INSTRUCTION",
      `Cannot decode instruction payload: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}
