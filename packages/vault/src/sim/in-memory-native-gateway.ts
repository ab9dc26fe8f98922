/**
 * InMemoryNativeGateway: repays native-currency debt via the wrapped token.
 *
 * Wraps the native value it received, repays the pool on the user's
 * behalf and refunds whatever the pool did not take.
 */

import { isAddressEqual } from "viem";
import type { Address } from "@tradevault/types";
import { encodeRevertReason } from "../revert-decoder.js";
import { NATIVE_CURRENCY } from "../token-ledger.js";
import type { TokenLedger } from "../token-ledger.js";
import { ProtocolRevertError } from "../types.js";
import type { InterestRateMode, LendingPool, NativeGateway } from "../types.js";

export class InMemoryNativeGateway implements NativeGateway {
  constructor(
    readonly address: Address,
    private readonly tokens: TokenLedger,
    private readonly pool: LendingPool,
    readonly wrappedNative: Address,
  ) {}

  async repayNative(
    caller: Address,
    pool: Address,
    amount: bigint,
    interestRateMode: InterestRateMode,
    onBehalfOf: Address,
  ): Promise<void> {
    if (!isAddressEqual(pool, this.pool.address)) {
      throw new ProtocolRevertError("unknown pool", encodeRevertReason("unknown pool"));
    }

    this.tokens.burn(NATIVE_CURRENCY, this.address, amount);
    this.tokens.mint(this.wrappedNative, this.address, amount);
    this.tokens.approve(this.wrappedNative, this.address, this.pool.address, amount);

    const paid = await this.pool.repay(this.address, this.wrappedNative, amount, interestRateMode, onBehalfOf);

    const refund = amount - paid;
    if (refund > 0n) {
      this.tokens.burn(this.wrappedNative, this.address, refund);
      this.tokens.mint(NATIVE_CURRENCY, caller, refund);
    }
  }
}
