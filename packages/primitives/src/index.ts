/**
 * @rootdrop/primitives: Frozen distribution primitives.
 *
 * This package contains ONLY frozen encodings, the proof verifier and
 * versioned schemas. It has no business logic, no I/O, no state.
 * Everything else in the monorepo imports from here, never the reverse.
 */

// Frozen primitives
export {
  fromHex,
  toHex,
  keccak,
  isHash32,
  isAddress,
  isZeroHash,
  normalizeHash,
  normalizeAddress,
  parseUint256,
  uint256ToBytes,
  bytesToUint256,
  compareBytes,
  ZERO_HASH,
  ZERO_ADDRESS,
  type Hash32,
  type Address,
} from "./hex.js";
export {
  encodeLeaf,
  leafHash,
  leafHashBytes,
  entitlementLeaf,
  type Entitlement,
} from "./leaf.js";
export { hashPair, processProof, verifyMerkleProof } from "./merkle.js";

// All schemas
export * from "./schemas/index.js";

// Constants
export * from "./constants.js";
