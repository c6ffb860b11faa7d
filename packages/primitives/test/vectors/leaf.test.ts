/**
 * Golden test vectors: leaf encoding.
 * The packed layout is FROZEN: proofs generated off-chain depend on it.
 */

import { describe, it, expect } from "vitest";
import { encodeLeaf, leafHash, entitlementLeaf } from "../../src/leaf.js";
import { keccak, toHex } from "../../src/hex.js";
import { UINT256_MAX } from "../../src/constants.js";

const ACCOUNT = "0x00000000000000000000000000000000000000ab";

describe("encodeLeaf", () => {
  it("packs index || account || amount into 84 bytes", () => {
    const bytes = encodeLeaf(1n, ACCOUNT, 2n);
    expect(bytes).toHaveLength(84);
    expect(bytes[31]).toBe(1);
    expect(bytes[51]).toBe(0xab);
    expect(bytes[83]).toBe(2);
    expect(bytes.slice(0, 31).every((b) => b === 0)).toBe(true);
    expect(bytes.slice(52, 83).every((b) => b === 0)).toBe(true);
  });

  it("encodes the maximum uint256 as 32 0xff bytes", () => {
    const bytes = encodeLeaf(UINT256_MAX, ACCOUNT, 0n);
    expect(bytes.slice(0, 32).every((b) => b === 0xff)).toBe(true);
  });

  it("treats account case as irrelevant", () => {
    const lower = "0x00000000000000000000000000000000000000ab";
    const upper = "0x00000000000000000000000000000000000000AB";
    expect(toHex(encodeLeaf(7n, lower, 9n))).toBe(toHex(encodeLeaf(7n, upper, 9n)));
  });

  it("rejects negative and oversized integers", () => {
    expect(() => encodeLeaf(-1n, ACCOUNT, 0n)).toThrow("out of range");
    expect(() => encodeLeaf(0n, ACCOUNT, UINT256_MAX + 1n)).toThrow("out of range");
  });

  it("rejects malformed accounts", () => {
    expect(() => encodeLeaf(0n, "0x1234", 0n)).toThrow("expected 0x + 40 hex chars");
  });
});

describe("leafHash", () => {
  it("is keccak256 of the packed encoding", () => {
    expect(leafHash(3n, ACCOUNT, 500n)).toBe(toHex(keccak(encodeLeaf(3n, ACCOUNT, 500n))));
  });

  it("distinguishes index, account and amount", () => {
    const base = leafHash(1n, ACCOUNT, 100n);
    expect(leafHash(2n, ACCOUNT, 100n)).not.toBe(base);
    expect(leafHash(1n, "0x00000000000000000000000000000000000000ac", 100n)).not.toBe(base);
    expect(leafHash(1n, ACCOUNT, 101n)).not.toBe(base);
  });

  it("entitlementLeaf matches leafHash", () => {
    expect(entitlementLeaf({ index: 4n, account: ACCOUNT, amount: 10n })).toBe(
      leafHash(4n, ACCOUNT, 10n),
    );
  });
});
