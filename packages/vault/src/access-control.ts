/**
 * AccessControl: manager set and trigger identity.
 *
 * Managers drive the vault; the trigger co-signs swap instructions
 * off-chain and never calls the vault itself.
 */

import { isAddressEqual, zeroAddress } from "viem";
import type { Address, ManagerAddedEvent, ManagerRemovedEvent } from "@tradevault/types";
import { VaultError } from "./types.js";
import type { Snapshottable } from "./types.js";

export interface AccessSnapshot {
  readonly managers: ReadonlyMap<string, Address>;
  readonly trigger: Address;
  readonly initialized: boolean;
}

export class AccessControl implements Snapshottable<AccessSnapshot> {
  // lowercase key → address as first registered
  private managers = new Map<string, Address>();
  private _trigger: Address = zeroAddress;
  private _initialized = false;

  get trigger(): Address {
    return this._trigger;
  }

  get initialized(): boolean {
    return this._initialized;
  }

  /**
   * One-time setup. Both the caller and the designated manager become managers.
   * The trigger must be non-zero: a zero recovered signer never matches it.
   */
  initialize(caller: Address, trigger: Address, manager: Address): void {
    if (this._initialized) {
      throw new VaultError("ALREADY_INITIALIZED", "Vault is already initialized");
    }
    if (isAddressEqual(trigger, zeroAddress)) {
      throw new VaultError("INVALID_ARGUMENT", "Trigger must not be the zero address");
    }
    this._initialized = true;
    this._trigger = trigger;
    this.managers.set(caller.toLowerCase(), caller);
    this.managers.set(manager.toLowerCase(), manager);
  }

  isManager(identity: Address): boolean {
    return this.managers.has(identity.toLowerCase());
  }

  requireManager(caller: Address): void {
    if (!this.isManager(caller)) {
      throw new VaultError("UNAUTHORIZED", `${caller} is not a manager`);
    }
  }

  /**
   * Idempotent toggle. The event is returned whether or not membership changed.
   */
  setManager(identity: Address, enabled: boolean): ManagerAddedEvent | ManagerRemovedEvent {
    if (enabled) {
      if (!this.isManager(identity)) {
        this.managers.set(identity.toLowerCase(), identity);
      }
      return { name: "ManagerAdded", manager: identity };
    }
    this.managers.delete(identity.toLowerCase());
    return { name: "ManagerRemoved", manager: identity };
  }

  snapshot(): AccessSnapshot {
    return {
      managers: new Map(this.managers),
      trigger: this._trigger,
      initialized: this._initialized,
    };
  }

  restore(snapshot: AccessSnapshot): void {
    this.managers = new Map(snapshot.managers);
    this._trigger = snapshot.trigger;
    this._initialized = snapshot.initialized;
  }
}
