/**
 * Claim files: JSON produced by distribution tooling, one per entitlement:
 * { index, account, period, amount, proof, root? }
 */

import { readFile } from "node:fs/promises";
import { Value } from "@sinclair/typebox/value";
import { ClaimFileV1 } from "@rootdrop/primitives";

export async function readClaimFile(path: string): Promise<ClaimFileV1> {
  const raw: unknown = JSON.parse(await readFile(path, "utf-8"));
  if (!Value.Check(ClaimFileV1, raw)) {
    const first = Value.Errors(ClaimFileV1, raw).First();
    throw new Error(`${path}: invalid claim file at ${first?.path || "/"}: ${first?.message ?? "unknown"}`);
  }
  return raw;
}
