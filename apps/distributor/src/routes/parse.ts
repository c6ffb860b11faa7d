/**
 * Wire → core conversion. Schemas have already checked shapes; this
 * enforces the uint256 range the regex cannot express.
 */

import { parseUint256 } from "@rootdrop/primitives";
import { DistributorError } from "../errors.js";

export function toUint(field: string, value: string): bigint {
  try {
    return parseUint256(value);
  } catch (err) {
    throw new DistributorError("INVALID_INPUT", `${field}: ${err instanceof Error ? err.message : String(err)}`, {
      field,
    });
  }
}
