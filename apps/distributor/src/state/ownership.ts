/**
 * Ownership: the administrative identity allowed to seed roots.
 *
 * Two-step transfer: the owner nominates, the nominee accepts.
 * Renouncing leaves no owner, after which nothing can be seeded.
 */

import { normalizeAddress, type Address } from "@rootdrop/primitives";
import { DistributorError } from "../errors.js";
import { requireAccount } from "../views/input.js";
import type { Journal } from "./journal.js";

export interface OwnershipState {
  owner: Address | null;
  pendingOwner: Address | null;
}

export class Ownership {
  private state: OwnershipState;

  constructor(
    private readonly journal: Journal,
    owner: Address | null,
  ) {
    this.state = { owner: owner === null ? null : normalizeAddress(owner), pendingOwner: null };
  }

  owner(): Address | null {
    return this.state.owner;
  }

  pendingOwner(): Address | null {
    return this.state.pendingOwner;
  }

  requireOwner(caller: Address): void {
    const account = requireAccount("caller", caller);
    if (this.state.owner === null || account !== this.state.owner) {
      throw new DistributorError("UNAUTHORIZED", "caller is not the owner", { caller });
    }
  }

  /** Nominate `newOwner`; takes effect on acceptOwnership(). */
  transferOwnership(caller: Address, newOwner: Address): void {
    this.requireOwner(caller);
    this.set({ owner: this.state.owner, pendingOwner: requireAccount("new_owner", newOwner) });
  }

  /** Returns the previous owner. */
  acceptOwnership(caller: Address): Address | null {
    const nominee = this.state.pendingOwner;
    const account = requireAccount("caller", caller);
    if (nominee === null || account !== nominee) {
      throw new DistributorError("UNAUTHORIZED", "caller is not the pending owner", { caller });
    }
    const previous = this.state.owner;
    this.set({ owner: nominee, pendingOwner: null });
    return previous;
  }

  /** Returns the previous owner. */
  renounceOwnership(caller: Address): Address | null {
    this.requireOwner(caller);
    const previous = this.state.owner;
    this.set({ owner: null, pendingOwner: null });
    return previous;
  }

  snapshot(): OwnershipState {
    return { ...this.state };
  }

  /** Snapshot restore (not journaled). */
  load(state: OwnershipState): void {
    this.state = { ...state };
  }

  private set(next: OwnershipState): void {
    const previous = this.state;
    this.state = next;
    this.journal.record(() => {
      this.state = previous;
    });
  }
}
