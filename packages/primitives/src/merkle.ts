/**
 * Merkle inclusion proof verification (sorted pairs).
 *
 * At each level the two children are ordered as big-endian integers before
 * hashing: parent = keccak256(min(a, b) || max(a, b)). A proof is therefore
 * just the sibling list; it carries no left/right positions, and the tree
 * builder must apply the same ordering rule.
 *
 * Pure and deterministic. Same routine on the server and in CLI tooling.
 */

import { HASH_BYTES } from "./constants.js";
import { compareBytes, fromHex, keccak, toHex, type Hash32 } from "./hex.js";

/** Hash an unordered pair: smaller value first. */
export function hashPair(a: Uint8Array, b: Uint8Array): Uint8Array {
  const combined = new Uint8Array(a.length + b.length);
  if (compareBytes(a, b) <= 0) {
    combined.set(a, 0);
    combined.set(b, a.length);
  } else {
    combined.set(b, 0);
    combined.set(a, b.length);
  }
  return keccak(combined);
}

/** Fold the proof over the leaf and return the implied root. */
export function processProof(proof: readonly Hash32[], leaf: Hash32): Uint8Array {
  let computed = fromHex(leaf);
  if (computed.length !== HASH_BYTES) {
    throw new Error(`processProof: leaf must be ${HASH_BYTES} bytes`);
  }

  for (const step of proof) {
    const sibling = fromHex(step);
    if (sibling.length !== HASH_BYTES) {
      throw new Error(`processProof: proof element must be ${HASH_BYTES} bytes`);
    }
    computed = hashPair(computed, sibling);
  }

  return computed;
}

/**
 * Verify a merkle proof for a given leaf.
 * Empty proof is valid only when root == leaf (single-leaf tree).
 */
export function verifyMerkleProof(
  proof: readonly Hash32[],
  root: Hash32,
  leaf: Hash32,
): boolean {
  return toHex(processProof(proof, leaf)) === root.toLowerCase();
}
