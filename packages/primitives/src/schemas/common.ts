/**
 * Shared wire primitives.
 */

import { Type } from "@sinclair/typebox";
import { MAX_PROOF_LENGTH } from "../constants.js";

export const Hex32 = Type.String({ pattern: "^0x[0-9a-fA-F]{64}$" });

export const HexAddress = Type.String({ pattern: "^0x[0-9a-fA-F]{40}$" });

/** Unsigned decimal, at most 78 digits; range to 2^256-1 checked on parse. */
export const DecimalU256 = Type.String({ pattern: "^(0|[1-9][0-9]{0,77})$" });

export const ProofV1 = Type.Array(Hex32, { maxItems: MAX_PROOF_LENGTH });
