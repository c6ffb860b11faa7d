/**
 * Read-only queries for indexers and UIs. No authorization, no side effects.
 */

import { MAX_QUERY_SPAN, type Hash32 } from "@rootdrop/primitives";
import { DistributorError } from "../errors.js";
import { requireUint256 } from "./input.js";
import type { DistributorStore } from "../state/store.js";

/** Inclusive span length; rejects reversed and oversized ranges. */
function spanOf(begin: bigint, end: bigint): number {
  if (end < begin) {
    throw new DistributorError("INVALID_RANGE", "period_end is before period_begin", {
      period_begin: begin.toString(),
      period_end: end.toString(),
    });
  }
  const span = end - begin + 1n;
  if (span > BigInt(MAX_QUERY_SPAN)) {
    throw new DistributorError("RANGE_TOO_LARGE", `range exceeds ${MAX_QUERY_SPAN} periods`, {
      span: span.toString(),
    });
  }
  return Number(span);
}

/**
 * Positional pairing: result[i] = isClaimed(periodBegin + i, indices[i]).
 * Not a cross product.
 */
export function claimStatus(
  store: DistributorStore,
  indices: readonly bigint[],
  periodBegin: bigint,
  periodEnd: bigint,
): boolean[] {
  requireUint256("period_begin", periodBegin);
  requireUint256("period_end", periodEnd);
  indices.forEach((index, i) => requireUint256(`indices[${i}]`, index));
  if (periodEnd >= periodBegin && BigInt(indices.length) !== periodEnd - periodBegin + 1n) {
    throw new DistributorError("LENGTH_MISMATCH", "indices length must equal period span", {
      indices: indices.length,
      span: (periodEnd - periodBegin + 1n).toString(),
    });
  }
  spanOf(periodBegin, periodEnd);

  return indices.map((index, i) => store.bitmap.isClaimed(periodBegin + BigInt(i), index));
}

/** Stored root (or ZERO_HASH) for each period in [periodBegin, periodEnd]. */
export function merkleRoots(store: DistributorStore, periodBegin: bigint, periodEnd: bigint): Hash32[] {
  requireUint256("period_begin", periodBegin);
  requireUint256("period_end", periodEnd);
  const span = spanOf(periodBegin, periodEnd);
  return Array.from({ length: span }, (_, i) => store.roots.rootOf(periodBegin + BigInt(i)));
}
