/**
 * Frozen protocol constants.
 *
 * FROZEN constants never change: proofs built off-chain depend on them.
 * LIMITS bound a single request and may be tuned per deployment.
 */

// ── Frozen (never change) ──────────────────────────────────────────
export const HASH_BYTES = 32;
export const ADDRESS_BYTES = 20;
export const UINT256_BYTES = 32;
/** index (32) || account (20) || amount (32) */
export const LEAF_ENCODING_BYTES = UINT256_BYTES + ADDRESS_BYTES + UINT256_BYTES;
export const UINT256_MAX = (1n << 256n) - 1n;

/** Indices per claimed-bitmap word. */
export const BITMAP_WORD_BITS = 256n;

// ── Limits ─────────────────────────────────────────────────────────
export const MAX_BATCH_ENTRIES = 256;
export const MAX_QUERY_SPAN = 1_024;
/** Upper bound on proof depth accepted on the wire (2^64 leaves). */
export const MAX_PROOF_LENGTH = 64;
export const EVENT_PAGE_DEFAULT = 100;
export const EVENT_PAGE_MAX = 1_000;

// ── Notification kinds ─────────────────────────────────────────────
export const EVENT_CLAIMED = "claimed.v1" as const;
export const EVENT_ROOT_SEEDED = "root.seeded.v1" as const;
export const EVENT_OWNERSHIP_TRANSFERRED = "ownership.transferred.v1" as const;
