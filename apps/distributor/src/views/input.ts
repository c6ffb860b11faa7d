/**
 * Input guards for the core entry points.
 * The HTTP layer validates shapes with schemas; these cover direct callers.
 */

import {
  UINT256_MAX,
  isAddress,
  isHash32,
  type Address,
  type Hash32,
} from "@rootdrop/primitives";
import { DistributorError } from "../errors.js";

export function requireAccount(field: string, value: string): Address {
  if (!isAddress(value)) {
    throw new DistributorError("INVALID_INPUT", `${field} must be 0x + 40 hex chars`, { field });
  }
  return value.toLowerCase();
}

export function requireHash(field: string, value: string): Hash32 {
  if (!isHash32(value)) {
    throw new DistributorError("INVALID_INPUT", `${field} must be 0x + 64 hex chars`, { field });
  }
  return value.toLowerCase();
}

export function requireUint256(field: string, value: bigint): bigint {
  if (value < 0n || value > UINT256_MAX) {
    throw new DistributorError("INVALID_INPUT", `${field} must be a uint256`, { field });
  }
  return value;
}

export function requireProof(proof: readonly string[]): Hash32[] {
  return proof.map((step, i) => requireHash(`proof[${i}]`, step));
}
