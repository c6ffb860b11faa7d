/**
 * Ownership: nominate the next owner.
 */

import { Type, type Static } from "@sinclair/typebox";
import { HexAddress } from "./common.js";

export const TransferOwnershipRequestV1 = Type.Object(
  {
    new_owner: HexAddress,
  },
  { additionalProperties: false },
);

export type TransferOwnershipRequestV1 = Static<typeof TransferOwnershipRequestV1>;
