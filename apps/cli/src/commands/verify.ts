/**
 * rootdrop verify <claim.json> [--root <hash>]
 *
 * Offline: recompute the leaf, fold the proof, compare with the root.
 * No network.
 */

import {
  isHash32,
  leafHash,
  parseUint256,
  processProof,
  toHex,
  type Hash32,
} from "@rootdrop/primitives";
import { readClaimFile } from "../lib/claim-file.js";

export interface VerifyResult {
  leaf: Hash32;
  computedRoot: Hash32;
  expectedRoot: Hash32;
  valid: boolean;
}

export async function verifyCommand(path: string, opts: { root?: string } = {}): Promise<VerifyResult> {
  const claim = await readClaimFile(path);

  const expected = opts.root ?? claim.root;
  if (expected === undefined) {
    throw new Error("No root to verify against: pass --root or include `root` in the claim file");
  }
  if (!isHash32(expected)) {
    throw new Error(`Invalid root: must be 0x + 64 hex chars. Got: ${expected}`);
  }

  const leaf = leafHash(parseUint256(claim.index), claim.account, parseUint256(claim.amount));
  const computedRoot = toHex(processProof(claim.proof, leaf));
  const expectedRoot = expected.toLowerCase();
  const valid = computedRoot === expectedRoot;

  console.log(`  period:   ${claim.period}`);
  console.log(`  index:    ${claim.index}`);
  console.log(`  account:  ${claim.account}`);
  console.log(`  amount:   ${claim.amount}`);
  console.log(`  leaf:     ${leaf}`);
  console.log(`  computed: ${computedRoot}`);
  console.log(`  expected: ${expectedRoot}`);
  console.log(valid ? "valid" : "invalid");

  return { leaf, computedRoot, expectedRoot, valid };
}
