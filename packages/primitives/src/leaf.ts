/**
 * Entitlement leaf encoding.
 *
 * leaf = keccak256(uint256_be(index) || address(20) || uint256_be(amount))
 *
 * Packed fixed-width layout: 84 bytes, no length prefixes. Must match the
 * off-chain tree builder byte-for-byte or no proof will verify.
 */

import { LEAF_ENCODING_BYTES, UINT256_BYTES, ADDRESS_BYTES } from "./constants.js";
import {
  fromHex,
  keccak,
  normalizeAddress,
  toHex,
  uint256ToBytes,
  type Address,
  type Hash32,
} from "./hex.js";

export interface Entitlement {
  index: bigint;
  account: Address;
  amount: bigint;
}

/** Packed leaf preimage. */
export function encodeLeaf(index: bigint, account: Address, amount: bigint): Uint8Array {
  const out = new Uint8Array(LEAF_ENCODING_BYTES);
  out.set(uint256ToBytes(index), 0);
  out.set(fromHex(normalizeAddress(account)), UINT256_BYTES);
  out.set(uint256ToBytes(amount), UINT256_BYTES + ADDRESS_BYTES);
  return out;
}

/** Leaf hash as raw bytes. */
export function leafHashBytes(index: bigint, account: Address, amount: bigint): Uint8Array {
  return keccak(encodeLeaf(index, account, amount));
}

/** Leaf hash as 0x-hex. */
export function leafHash(index: bigint, account: Address, amount: bigint): Hash32 {
  return toHex(leafHashBytes(index, account, amount));
}

export function entitlementLeaf(e: Entitlement): Hash32 {
  return leafHash(e.index, e.account, e.amount);
}
