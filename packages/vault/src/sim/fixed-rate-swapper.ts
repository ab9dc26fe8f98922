/**
 * FixedRateSwapper: an in-process swapper contract.
 *
 * Understands one call, `swap(tokenIn, tokenOut, amountIn, minAmountOut)`:
 * pulls `amountIn` of tokenIn from the caller (allowance required) and pays
 * `amountIn * numerator / denominator` of tokenOut from its own inventory.
 * Any other call data reverts without a reason.
 */

import { decodeFunctionData, encodeAbiParameters, encodeFunctionData, parseAbi } from "viem";
import type { Address, Hex } from "@tradevault/types";
import { encodeRevertReason } from "../revert-decoder.js";
import type { TokenLedger } from "../token-ledger.js";
import { ProtocolRevertError } from "../types.js";
import type { CallableTarget, CallFrame, CallResult } from "../types.js";

export const FIXED_RATE_SWAPPER_ABI = parseAbi([
  "function swap(address tokenIn, address tokenOut, uint256 amountIn, uint256 minAmountOut) returns (uint256)",
]);

export interface SwapRate {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

export interface SwapCall {
  readonly tokenIn: Address;
  readonly tokenOut: Address;
  readonly amountIn: bigint;
  readonly minAmountOut: bigint;
}

/** Invoked before any token moves; may call back into other contracts. */
export type SwapHook = (frame: CallFrame, call: SwapCall) => Promise<void>;

export function encodeSwapCall(call: SwapCall): Hex {
  return encodeFunctionData({
    abi: FIXED_RATE_SWAPPER_ABI,
    functionName: "swap",
    args: [call.tokenIn, call.tokenOut, call.amountIn, call.minAmountOut],
  });
}

export class FixedRateSwapper implements CallableTarget {
  constructor(
    readonly address: Address,
    private readonly tokens: TokenLedger,
    private readonly rate: SwapRate,
    private readonly beforeSwap?: SwapHook,
  ) {}

  quote(amountIn: bigint): bigint {
    return (amountIn * this.rate.numerator) / this.rate.denominator;
  }

  async call(frame: CallFrame, data: Hex): Promise<CallResult> {
    let call: SwapCall;
    try {
      const { args } = decodeFunctionData({ abi: FIXED_RATE_SWAPPER_ABI, data });
      const [tokenIn, tokenOut, amountIn, minAmountOut] = args;
      call = { tokenIn, tokenOut, amountIn, minAmountOut };
    } catch {
      return { success: false, returnData: "0x" };
    }

    if (this.beforeSwap) {
      await this.beforeSwap(frame, call);
    }

    const amountOut = this.quote(call.amountIn);
    if (amountOut < call.minAmountOut) {
      throw new ProtocolRevertError("insufficient output amount", encodeRevertReason("insufficient output amount"));
    }

    this.tokens.transferFrom(call.tokenIn, this.address, frame.caller, this.address, call.amountIn);
    this.tokens.transfer(call.tokenOut, this.address, frame.caller, amountOut);

    return { success: true, returnData: encodeAbiParameters([{ type: "uint256" }], [amountOut]) };
  }
}
