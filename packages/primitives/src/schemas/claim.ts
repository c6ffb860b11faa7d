/**
 * Claim requests: single and batched.
 */

import { Type, type Static } from "@sinclair/typebox";
import { MAX_BATCH_ENTRIES } from "../constants.js";
import { HexAddress, Hex32, ProofV1, DecimalU256 } from "./common.js";

export const ClaimRequestV1 = Type.Object(
  {
    index: DecimalU256,
    account: HexAddress,
    period: DecimalU256,
    amount: DecimalU256,
    proof: ProofV1,
  },
  { additionalProperties: false },
);

export type ClaimRequestV1 = Static<typeof ClaimRequestV1>;

export const BatchClaimEntryV1 = Type.Object(
  {
    index: DecimalU256,
    period: DecimalU256,
    amount: DecimalU256,
    proof: ProofV1,
  },
  { additionalProperties: false },
);

export type BatchClaimEntryV1 = Static<typeof BatchClaimEntryV1>;

export const BatchClaimRequestV1 = Type.Object(
  {
    account: HexAddress,
    entries: Type.Array(BatchClaimEntryV1, { maxItems: MAX_BATCH_ENTRIES }),
  },
  { additionalProperties: false },
);

export type BatchClaimRequestV1 = Static<typeof BatchClaimRequestV1>;

/**
 * Claim file consumed by offline tooling: a claim request plus the root it
 * was generated against.
 */
export const ClaimFileV1 = Type.Object({
  index: DecimalU256,
  account: HexAddress,
  period: DecimalU256,
  amount: DecimalU256,
  proof: ProofV1,
  root: Type.Optional(Hex32),
});

export type ClaimFileV1 = Static<typeof ClaimFileV1>;
