/**
 * Schema barrel export.
 * All V1 wire types used by the service and tooling.
 */

export { Hex32, HexAddress, DecimalU256, ProofV1 } from "./common.js";

export {
  ClaimRequestV1,
  BatchClaimEntryV1,
  BatchClaimRequestV1,
  ClaimFileV1,
} from "./claim.js";

export { SeedRequestV1 } from "./seed.js";

export { TransferOwnershipRequestV1 } from "./owner.js";

export { ClaimStatusRequestV1, RootRangeQueryV1 } from "./query.js";

export {
  ClaimedPayload,
  RootSeededPayload,
  OwnershipTransferredPayload,
  DistributorEventV1,
} from "./event.js";
