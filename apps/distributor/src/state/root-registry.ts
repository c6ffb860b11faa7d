/**
 * Root registry: insert-only period → merkle root.
 *
 * A period's root is unset (ZERO_HASH) until seeded, then fixed forever.
 * There is no update or delete path; only the journal may remove a root,
 * and only when the seeding call that stored it fails.
 */

import { ZERO_HASH, normalizeHash, type Hash32 } from "@rootdrop/primitives";
import { DistributorError } from "../errors.js";
import type { Journal } from "./journal.js";

export interface RootEntry {
  period: bigint;
  root: Hash32;
}

export class RootRegistry {
  private readonly roots = new Map<bigint, Hash32>();

  constructor(private readonly journal: Journal) {}

  /** Stored root, or ZERO_HASH when the period was never seeded. */
  rootOf(period: bigint): Hash32 {
    return this.roots.get(period) ?? ZERO_HASH;
  }

  has(period: bigint): boolean {
    return this.roots.has(period);
  }

  insert(period: bigint, root: Hash32): void {
    if (this.roots.has(period)) {
      throw new DistributorError("ROOT_ALREADY_SET", `root already set for period ${period.toString()}`, {
        period: period.toString(),
      });
    }
    this.roots.set(period, normalizeHash(root));
    this.journal.record(() => {
      this.roots.delete(period);
    });
  }

  get size(): number {
    return this.roots.size;
  }

  /** All seeded periods, ascending. */
  entries(): RootEntry[] {
    return [...this.roots.entries()]
      .map(([period, root]) => ({ period, root }))
      .sort((a, b) => (a.period < b.period ? -1 : a.period > b.period ? 1 : 0));
  }

  /** Snapshot restore (not journaled). */
  load(entries: readonly RootEntry[]): void {
    this.roots.clear();
    for (const { period, root } of entries) {
      this.roots.set(period, normalizeHash(root));
    }
  }
}
