/**
 * Seeding: publish a period root and fund it.
 */

import { Type, type Static } from "@sinclair/typebox";
import { HexAddress, Hex32, DecimalU256 } from "./common.js";

export const SeedRequestV1 = Type.Object(
  {
    period: DecimalU256,
    root: Hex32,
    total_allocation: DecimalU256,
    funding_source: HexAddress,
  },
  { additionalProperties: false },
);

export type SeedRequestV1 = Static<typeof SeedRequestV1>;
