/**
 * Read-only range queries.
 */

import { Type, type Static } from "@sinclair/typebox";
import { MAX_QUERY_SPAN } from "../constants.js";
import { DecimalU256 } from "./common.js";

export const ClaimStatusRequestV1 = Type.Object(
  {
    indices: Type.Array(DecimalU256, { maxItems: MAX_QUERY_SPAN }),
    period_begin: DecimalU256,
    period_end: DecimalU256,
  },
  { additionalProperties: false },
);

export type ClaimStatusRequestV1 = Static<typeof ClaimStatusRequestV1>;

export const RootRangeQueryV1 = Type.Object({
  from: DecimalU256,
  to: DecimalU256,
});

export type RootRangeQueryV1 = Static<typeof RootRangeQueryV1>;
