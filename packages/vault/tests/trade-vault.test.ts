/**
 * Tests for TradeVault: initialization, access control, entry-point
 * gating and the margin boundary.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { getAddress, maxUint256, zeroAddress, zeroHash } from "viem";
import type { Hex } from "@tradevault/types";
import { deploySimulatedVault } from "../src/sim/deployment.js";
import type { TxReceipt } from "../src/types.js";
import {
  buildInstruction,
  createTestEnv,
  DEPLOYER,
  expectVaultError,
  MANAGER,
  OUTSIDER,
  triggerAccount,
  USDT,
  usdtToWeth,
} from "./setup.js";
import type { TestEnv } from "./setup.js";

const REFERRAL_TAG: Hex = `0x${"ab".repeat(32)}`;

// =============================================================================
// Initialization
// =============================================================================

describe("initialize", () => {
  it("makes the caller and the designated address managers and fixes the trigger", async () => {
    const { vault } = deploySimulatedVault();
    const receipt = await vault.initialize({ from: DEPLOYER }, { trigger: triggerAccount.address, manager: MANAGER });

    expect(vault.isManager(DEPLOYER)).toBe(true);
    expect(vault.isManager(MANAGER)).toBe(true);
    expect(vault.isManager(OUTSIDER)).toBe(false);
    expect(vault.trigger).toBe(triggerAccount.address);
    expect(receipt.logs.map((log) => log.event)).toEqual([
      { name: "Initialized", trigger: triggerAccount.address },
    ]);
  });

  it("applies defaults", async () => {
    const { vault, addresses } = deploySimulatedVault();
    await vault.initialize({ from: DEPLOYER }, { trigger: triggerAccount.address, manager: MANAGER });

    expect(vault.settings).toEqual({
      lendingPool: addresses.lendingPool,
      lendingDataProvider: addresses.lendingPool,
      nativeGateway: addresses.nativeGateway,
      lendingReferralCode: 0,
      marginRouter: addresses.marginRouter,
      marginPositionRouter: addresses.marginPositionRouter,
      marginReferralCode: zeroHash,
      swapApprovalAmount: maxUint256,
      accessPolicy: "legacy",
    });
  });

  it("can be called exactly once", async () => {
    const env = await createTestEnv();
    await expectVaultError(
      env.vault.initialize({ from: OUTSIDER }, { trigger: OUTSIDER, manager: OUTSIDER }),
      "ALREADY_INITIALIZED",
    );
    expect(env.vault.trigger).toBe(triggerAccount.address);
    expect(env.vault.isManager(OUTSIDER)).toBe(false);
  });

  it("rejects a zero trigger and stays uninitialized", async () => {
    const { vault } = deploySimulatedVault();
    await expectVaultError(
      vault.initialize({ from: DEPLOYER }, { trigger: zeroAddress, manager: MANAGER }),
      "INVALID_ARGUMENT",
    );
    expect(vault.isManager(DEPLOYER)).toBe(false);

    await vault.initialize({ from: DEPLOYER }, { trigger: triggerAccount.address, manager: MANAGER });
    expect(vault.trigger).toBe(triggerAccount.address);
  });

  it("rejects out-of-range referral codes", async () => {
    const { vault } = deploySimulatedVault();
    const base = { trigger: triggerAccount.address, manager: MANAGER };

    await expectVaultError(
      vault.initialize({ from: DEPLOYER }, { ...base, lendingReferralCode: 65_536 }),
      "INVALID_ARGUMENT",
    );
    await expectVaultError(
      vault.initialize({ from: DEPLOYER }, { ...base, marginReferralCode: "0x12" }),
      "INVALID_ARGUMENT",
    );
    expect(vault.isManager(DEPLOYER)).toBe(false);
  });

  it("matches identities case-insensitively", async () => {
    const env = await createTestEnv();
    expect(env.vault.isManager(getAddress(MANAGER))).toBe(true);
  });
});

// =============================================================================
// setManager
// =============================================================================

describe("setManager", () => {
  it("adds and removes managers with events", async () => {
    const env = await createTestEnv();

    const added = await env.vault.setManager({ from: MANAGER }, OUTSIDER, true);
    expect(env.vault.isManager(OUTSIDER)).toBe(true);
    expect(added.logs.map((log) => log.event)).toEqual([{ name: "ManagerAdded", manager: OUTSIDER }]);

    const removed = await env.vault.setManager({ from: MANAGER }, OUTSIDER, false);
    expect(env.vault.isManager(OUTSIDER)).toBe(false);
    expect(removed.logs.map((log) => log.event)).toEqual([{ name: "ManagerRemoved", manager: OUTSIDER }]);
  });

  it("is unrestricted under the legacy policy", async () => {
    const env = await createTestEnv();
    await env.vault.setManager({ from: OUTSIDER }, OUTSIDER, true);
    expect(env.vault.isManager(OUTSIDER)).toBe(true);
  });

  it("is manager-gated under the guarded policy", async () => {
    const env = await createTestEnv({ accessPolicy: "guarded" });
    await expectVaultError(env.vault.setManager({ from: OUTSIDER }, OUTSIDER, true), "UNAUTHORIZED");
    expect(env.vault.isManager(OUTSIDER)).toBe(false);

    await env.vault.setManager({ from: MANAGER }, OUTSIDER, true);
    expect(env.vault.isManager(OUTSIDER)).toBe(true);
  });

  it("lets a manager remove itself", async () => {
    const env = await createTestEnv({ accessPolicy: "guarded" });
    await env.vault.setManager({ from: MANAGER }, MANAGER, false);
    await expectVaultError(env.vault.setManager({ from: MANAGER }, MANAGER, true), "UNAUTHORIZED");
  });
});

// =============================================================================
// Gated entry points
// =============================================================================

describe("manager gating", () => {
  let env: TestEnv;

  beforeEach(async () => {
    env = await createTestEnv({ accessPolicy: "guarded" });
  });

  const entryPoints: ReadonlyArray<readonly [string, (env: TestEnv) => Promise<TxReceipt<unknown>>]> = [
    ["swap", async (e) => e.vault.swap({ from: OUTSIDER }, await buildInstruction(usdtToWeth(1n)))],
    ["multiSwap", (e) => e.vault.multiSwap({ from: OUTSIDER }, [])],
    ["aaveSupply", (e) => e.vault.aaveSupply({ from: OUTSIDER }, USDT, 1n)],
    ["aaveWithdraw", (e) => e.vault.aaveWithdraw({ from: OUTSIDER }, USDT, 1n)],
    ["aaveBorrow", (e) => e.vault.aaveBorrow({ from: OUTSIDER }, USDT, 1n, 2n)],
    ["aaveRepay", (e) => e.vault.aaveRepay({ from: OUTSIDER }, USDT, 1n, 2n)],
    ["setAaveReferralCode", (e) => e.vault.setAaveReferralCode({ from: OUTSIDER }, 1)],
    ["setGmxReferralCode", (e) => e.vault.setGmxReferralCode({ from: OUTSIDER }, REFERRAL_TAG)],
    ["gmxApprovePlugin", (e) => e.vault.gmxApprovePlugin({ from: OUTSIDER })],
    ["setManager", (e) => e.vault.setManager({ from: OUTSIDER }, OUTSIDER, true)],
  ];

  for (const [name, invoke] of entryPoints) {
    it(`rejects a non-manager calling ${name}`, async () => {
      const logsBefore = env.chain.logs.length;
      await expectVaultError(invoke(env), "UNAUTHORIZED");
      expect(env.chain.logs).toHaveLength(logsBefore);
    });
  }

  it("lets managers call the gated setters", async () => {
    await env.vault.setAaveReferralCode({ from: MANAGER }, 42);
    await env.vault.setGmxReferralCode({ from: DEPLOYER }, REFERRAL_TAG);

    expect(env.vault.settings.lendingReferralCode).toBe(42);
    expect(env.vault.settings.marginReferralCode).toBe(REFERRAL_TAG);
  });
});

// =============================================================================
// Referral codes
// =============================================================================

describe("referral codes", () => {
  let env: TestEnv;

  beforeEach(async () => {
    env = await createTestEnv();
  });

  it("accepts the uint16 bounds", async () => {
    await env.vault.setAaveReferralCode({ from: MANAGER }, 65_535);
    expect(env.vault.settings.lendingReferralCode).toBe(65_535);

    await env.vault.setAaveReferralCode({ from: MANAGER }, 0);
    expect(env.vault.settings.lendingReferralCode).toBe(0);
  });

  for (const code of [65_536, 70_000, -1, 1.5]) {
    it(`rejects lending referral code ${code}`, async () => {
      await expectVaultError(env.vault.setAaveReferralCode({ from: MANAGER }, code), "INVALID_ARGUMENT");
      expect(env.vault.settings.lendingReferralCode).toBe(0);
    });
  }

  for (const code of ["0x12", `0x${"ab".repeat(33)}`, "0xzz"] as const) {
    it(`rejects margin referral code ${code.slice(0, 6)} of length ${code.length}`, async () => {
      await expectVaultError(env.vault.setGmxReferralCode({ from: MANAGER }, code), "INVALID_ARGUMENT");
      expect(env.vault.settings.marginReferralCode).toBe(zeroHash);
    });
  }
});

// =============================================================================
// Margin boundary
// =============================================================================

describe("margin adapter", () => {
  it("approves the position router as a plugin of the margin router", async () => {
    const env = await createTestEnv();
    await env.vault.gmxApprovePlugin({ from: OUTSIDER });
    expect(env.marginRouter.approvedPlugins(env.addresses.vault, env.addresses.marginPositionRouter)).toBe(true);
  });

  it("requires a manager under the guarded policy", async () => {
    const env = await createTestEnv({ accessPolicy: "guarded" });
    await env.vault.gmxApprovePlugin({ from: MANAGER });
    expect(env.marginRouter.approvedPlugins(env.addresses.vault, env.addresses.marginPositionRouter)).toBe(true);
  });

  it("passes the minimum execution fee through", async () => {
    const { vault } = deploySimulatedVault({ minExecutionFee: 180_000_000_000_000n });
    expect(await vault.gmxMinExecutionFee()).toBe(180_000_000_000_000n);
  });
});
