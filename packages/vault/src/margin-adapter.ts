/**
 * MarginAdapter: boundary calls into the perpetual-margin protocol.
 *
 * Position open/close happens off-chain through signed orders; the vault
 * only needs to approve the position router as a plugin and quote fees.
 */

import type { MarginPositionRouter, MarginRouter, VaultContext } from "./types.js";

export class MarginAdapter {
  constructor(
    private readonly ctx: VaultContext,
    private readonly router: MarginRouter,
    private readonly positionRouter: MarginPositionRouter,
  ) {}

  async approveExecutionPlugin(): Promise<void> {
    await this.router.approvePlugin(this.ctx.address, this.positionRouter.address);
  }

  async getMinExecutionFee(): Promise<bigint> {
    return this.positionRouter.minExecutionFee();
  }
}
