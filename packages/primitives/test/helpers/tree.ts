/**
 * Test-only sorted-pair merkle tree builder.
 *
 * Mirrors what an off-chain distribution tool does: hash every leaf, then
 * pair up levels with hashPair(). Odd node at the end of a level is promoted.
 */

import { hashPair } from "../../src/merkle.js";
import { fromHex, toHex, type Hash32 } from "../../src/hex.js";
import { entitlementLeaf, type Entitlement } from "../../src/leaf.js";

export interface TestTree {
  root: Hash32;
  leaves: Hash32[];
  /** levels[0] = leaves, last level = [root] */
  levels: Hash32[][];
}

export function buildTree(leaves: readonly Hash32[]): TestTree {
  if (leaves.length === 0) {
    throw new Error("buildTree: empty leaf list");
  }

  const levels: Hash32[][] = [[...leaves]];
  let level = levels[0] ?? [];

  while (level.length > 1) {
    const next: Hash32[] = [];
    for (let i = 0; i < level.length; i += 2) {
      const left = level[i];
      const right = level[i + 1];
      if (left === undefined) break;
      next.push(right === undefined ? left : toHex(hashPair(fromHex(left), fromHex(right))));
    }
    levels.push(next);
    level = next;
  }

  return { root: level[0] ?? leaves[0] ?? "", leaves: [...leaves], levels };
}

/** Sibling path for the leaf at `position`. Promoted nodes contribute nothing. */
export function getProof(tree: TestTree, position: number): Hash32[] {
  const proof: Hash32[] = [];
  let pos = position;

  for (const level of tree.levels.slice(0, -1)) {
    const siblingPos = pos % 2 === 0 ? pos + 1 : pos - 1;
    const sibling = level[siblingPos];
    if (sibling !== undefined) proof.push(sibling);
    pos = Math.floor(pos / 2);
  }

  return proof;
}

export function buildEntitlementTree(entitlements: readonly Entitlement[]): TestTree {
  return buildTree(entitlements.map(entitlementLeaf));
}

/** Deterministic test address: 0x followed by `n` left-padded to 40 hex chars. */
export function testAddress(n: number): string {
  return `0x${n.toString(16).padStart(40, "0")}`;
}
