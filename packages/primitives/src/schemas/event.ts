/**
 * Distributor notifications: one per committed state change.
 * Indexers page through these instead of polling per index.
 */

import { Type, type Static } from "@sinclair/typebox";
import {
  EVENT_CLAIMED,
  EVENT_OWNERSHIP_TRANSFERRED,
  EVENT_ROOT_SEEDED,
} from "../constants.js";
import { HexAddress, Hex32, DecimalU256 } from "./common.js";

export const ClaimedPayload = Type.Object(
  {
    period: DecimalU256,
    index: DecimalU256,
    account: HexAddress,
    amount: DecimalU256,
  },
  { additionalProperties: false },
);

export type ClaimedPayload = Static<typeof ClaimedPayload>;

export const RootSeededPayload = Type.Object(
  {
    period: DecimalU256,
    root: Hex32,
    total_allocation: DecimalU256,
    funding_source: HexAddress,
  },
  { additionalProperties: false },
);

export type RootSeededPayload = Static<typeof RootSeededPayload>;

export const OwnershipTransferredPayload = Type.Object(
  {
    previous_owner: Type.Union([HexAddress, Type.Null()]),
    new_owner: Type.Union([HexAddress, Type.Null()]),
  },
  { additionalProperties: false },
);

export type OwnershipTransferredPayload = Static<typeof OwnershipTransferredPayload>;

const envelope = {
  /** Monotonic sequence number within the log (starts at 1). */
  seq: Type.Integer({ minimum: 1 }),
  /** Commit time (ms since epoch). */
  timestamp: Type.Integer({ minimum: 0 }),
};

export const DistributorEventV1 = Type.Union([
  Type.Object({ ...envelope, kind: Type.Literal(EVENT_CLAIMED), payload: ClaimedPayload }),
  Type.Object({ ...envelope, kind: Type.Literal(EVENT_ROOT_SEEDED), payload: RootSeededPayload }),
  Type.Object({
    ...envelope,
    kind: Type.Literal(EVENT_OWNERSHIP_TRANSFERRED),
    payload: OwnershipTransferredPayload,
  }),
]);

export type DistributorEventV1 = Static<typeof DistributorEventV1>;
