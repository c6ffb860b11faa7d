/**
 * Hex, hash and integer encoding.
 *
 * All 32-byte values (roots, leaves, proof siblings) travel as
 * "0x" + 64 lowercase hex chars. Addresses are "0x" + 40 hex chars.
 * Unsigned 256-bit integers are bigint in code and decimal strings on the wire.
 */

import { keccak_256 } from "@noble/hashes/sha3";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { HASH_BYTES, ADDRESS_BYTES, UINT256_MAX } from "./constants.js";

/** 0x-prefixed hex-encoded 32-byte hash. */
export type Hash32 = string;

/** 0x-prefixed hex-encoded 20-byte account address (lowercase once normalized). */
export type Address = string;

const HASH32_RE = /^0x[0-9a-fA-F]{64}$/;
const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const UINT_RE = /^(0|[1-9][0-9]*)$/;

export const ZERO_HASH: Hash32 = `0x${"00".repeat(HASH_BYTES)}`;
export const ZERO_ADDRESS: Address = `0x${"00".repeat(ADDRESS_BYTES)}`;

/** Convert hex string (with or without 0x) to bytes. */
export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex.startsWith("0x") ? hex.slice(2) : hex);
}

/** Convert bytes to 0x-prefixed lowercase hex. */
export function toHex(bytes: Uint8Array): string {
  return `0x${bytesToHex(bytes)}`;
}

/** Raw keccak-256 of bytes. */
export function keccak(bytes: Uint8Array): Uint8Array {
  return keccak_256(bytes);
}

export function isHash32(value: string): boolean {
  return HASH32_RE.test(value);
}

export function isAddress(value: string): boolean {
  return ADDRESS_RE.test(value);
}

export function isZeroHash(hash: Hash32): boolean {
  return hash.toLowerCase() === ZERO_HASH;
}

/** Lowercase a hash after checking its shape. */
export function normalizeHash(value: string): Hash32 {
  if (!isHash32(value)) {
    throw new Error(`normalizeHash: expected 0x + 64 hex chars, got ${value}`);
  }
  return value.toLowerCase();
}

/** Lowercase an address after checking its shape. */
export function normalizeAddress(value: string): Address {
  if (!isAddress(value)) {
    throw new Error(`normalizeAddress: expected 0x + 40 hex chars, got ${value}`);
  }
  return value.toLowerCase();
}

/** Parse a decimal string into a uint256 bigint. */
export function parseUint256(value: string): bigint {
  if (!UINT_RE.test(value)) {
    throw new Error(`parseUint256: not an unsigned decimal integer: ${value}`);
  }
  const n = BigInt(value);
  if (n > UINT256_MAX) {
    throw new Error(`parseUint256: exceeds 2^256-1: ${value}`);
  }
  return n;
}

/** uint256 → 32 bytes big-endian. */
export function uint256ToBytes(value: bigint): Uint8Array {
  if (value < 0n || value > UINT256_MAX) {
    throw new Error(`uint256ToBytes: out of range: ${value.toString()}`);
  }
  return fromHex(value.toString(16).padStart(HASH_BYTES * 2, "0"));
}

/** Big-endian bytes → unsigned bigint. */
export function bytesToUint256(bytes: Uint8Array): bigint {
  if (bytes.length === 0) return 0n;
  return BigInt(toHex(bytes));
}

/**
 * Compare two byte strings of equal length as big-endian unsigned integers.
 * Returns -1, 0 or 1.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
  if (a.length !== b.length) {
    throw new Error(`compareBytes: length mismatch ${a.length} vs ${b.length}`);
  }
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    if (x !== y) return x < y ? -1 : 1;
  }
  return 0;
}
