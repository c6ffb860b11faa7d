/**
 * Distributor error taxonomy.
 *
 * Every failure aborts the enclosing call (or whole batch) and rolls back
 * its state changes. No retry happens here; callers resubmit.
 */

export type DistributorErrorCode =
  | "ALREADY_CLAIMED"
  | "INVALID_PROOF"
  | "ROOT_ALREADY_SET"
  | "LENGTH_MISMATCH"
  | "TRANSFER_FAILED"
  | "INVALID_ROOT"
  | "INVALID_RANGE"
  | "RANGE_TOO_LARGE"
  | "EMPTY_BATCH"
  | "BATCH_TOO_LARGE"
  | "UNAUTHORIZED"
  | "INVALID_INPUT"
  | "REENTRANT_CALL"
  | "UNAVAILABLE";

export class DistributorError extends Error {
  readonly code: DistributorErrorCode;
  readonly details: Record<string, string | number>;

  constructor(
    code: DistributorErrorCode,
    message: string,
    details: Record<string, string | number> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "DistributorError";
    this.code = code;
    this.details = details;
  }
}

export function isDistributorError(err: unknown): err is DistributorError {
  return err instanceof DistributorError;
}

/** HTTP status for each code. */
export const HTTP_STATUS: Record<DistributorErrorCode, number> = {
  ALREADY_CLAIMED: 409,
  ROOT_ALREADY_SET: 409,
  INVALID_PROOF: 422,
  LENGTH_MISMATCH: 400,
  INVALID_ROOT: 400,
  INVALID_RANGE: 400,
  RANGE_TOO_LARGE: 400,
  EMPTY_BATCH: 400,
  BATCH_TOO_LARGE: 400,
  INVALID_INPUT: 400,
  UNAUTHORIZED: 403,
  REENTRANT_CALL: 409,
  TRANSFER_FAILED: 502,
  UNAVAILABLE: 503,
};
