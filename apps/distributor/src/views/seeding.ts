/**
 * Seeding: publish a period's root and pull its funding into custody.
 *
 * The root is stored before the pull; if the pull fails the transaction
 * unwinds and the root disappears with it. A root never exists without
 * its funding call having succeeded.
 *
 * total_allocation is taken on trust: nothing checks it against the sum
 * of the tree's leaves.
 */

import { EVENT_ROOT_SEEDED, isZeroHash, type Address, type Hash32 } from "@rootdrop/primitives";
import { DistributorError } from "../errors.js";
import type { DistributorContext } from "./context.js";
import { requireAccount, requireHash, requireUint256 } from "./input.js";

export interface SeedInput {
  period: bigint;
  root: Hash32;
  totalAllocation: bigint;
  fundingSource: Address;
}

export interface SeedResult {
  period: bigint;
  root: Hash32;
  totalAllocation: bigint;
}

export async function seed(
  ctx: DistributorContext,
  caller: Address,
  input: SeedInput,
): Promise<SeedResult> {
  ctx.store.ownership.requireOwner(caller);

  const period = requireUint256("period", input.period);
  const totalAllocation = requireUint256("total_allocation", input.totalAllocation);
  const root = requireHash("root", input.root);
  if (isZeroHash(root)) {
    throw new DistributorError("INVALID_ROOT", "root must be non-zero", {
      period: period.toString(),
    });
  }
  const fundingSource = requireAccount("funding_source", input.fundingSource);

  ctx.store.roots.insert(period, root);

  let ok: boolean;
  try {
    ok = await ctx.ledger.transferFrom(fundingSource, ctx.custody, totalAllocation);
  } catch (err) {
    throw new DistributorError(
      "TRANSFER_FAILED",
      `ledger transferFrom errored: ${err instanceof Error ? err.message : String(err)}`,
      { from: fundingSource, amount: totalAllocation.toString() },
      { cause: err },
    );
  }
  if (!ok) {
    throw new DistributorError("TRANSFER_FAILED", "ledger refused funding transfer", {
      from: fundingSource,
      amount: totalAllocation.toString(),
    });
  }

  ctx.store.events.emit({
    kind: EVENT_ROOT_SEEDED,
    payload: {
      period: period.toString(),
      root,
      total_allocation: totalAllocation.toString(),
      funding_source: fundingSource,
    },
  });

  return { period, root, totalAllocation };
}
