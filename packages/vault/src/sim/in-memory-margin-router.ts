/**
 * In-process margin router and position router.
 */

import type { Address } from "@tradevault/types";
import type { MarginPositionRouter, MarginRouter, Snapshottable } from "../types.js";

export class InMemoryMarginRouter implements MarginRouter, Snapshottable<ReadonlySet<string>> {
  // "account:plugin", lowercase
  private approvals = new Set<string>();

  constructor(readonly address: Address) {}

  async approvePlugin(caller: Address, plugin: Address): Promise<void> {
    this.approvals.add(`${caller.toLowerCase()}:${plugin.toLowerCase()}`);
  }

  approvedPlugins(account: Address, plugin: Address): boolean {
    return this.approvals.has(`${account.toLowerCase()}:${plugin.toLowerCase()}`);
  }

  snapshot(): ReadonlySet<string> {
    return new Set(this.approvals);
  }

  restore(snapshot: ReadonlySet<string>): void {
    this.approvals = new Set(snapshot);
  }
}

export class InMemoryPositionRouter implements MarginPositionRouter {
  constructor(
    readonly address: Address,
    private readonly executionFee: bigint,
  ) {}

  async minExecutionFee(): Promise<bigint> {
    return this.executionFee;
  }
}
