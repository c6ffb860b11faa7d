/**
 * Claim processing: single and batched.
 *
 * Per entry:
 *   1. reject if (period, index) already claimed
 *   2. leaf = keccak256(index || account || amount)
 *   3. reject unless proof verifies against rootOf(period)
 *   4. mark claimed
 * then pay out. Step 4 precedes the transfer.
 *
 * Runs inside a transaction: any throw unwinds the bitmap and staged
 * notifications for the whole call (whole batch).
 */

import {
  EVENT_CLAIMED,
  MAX_BATCH_ENTRIES,
  leafHash,
  verifyMerkleProof,
  type Address,
  type Hash32,
} from "@rootdrop/primitives";
import { DistributorError } from "../errors.js";
import type { DistributorContext } from "./context.js";
import { requireAccount, requireProof, requireUint256 } from "./input.js";

// ── Types ──────────────────────────────────────────────────────────

export interface ClaimInput {
  index: bigint;
  account: Address;
  period: bigint;
  amount: bigint;
  proof: readonly Hash32[];
}

export interface BatchClaimEntry {
  index: bigint;
  period: bigint;
  amount: bigint;
  proof: readonly Hash32[];
}

export interface ClaimReceipt {
  period: bigint;
  index: bigint;
  account: Address;
  amount: bigint;
}

export interface BatchReceipt {
  account: Address;
  total: bigint;
  claims: ClaimReceipt[];
}

// ── Core ───────────────────────────────────────────────────────────

function checkEntry(entry: BatchClaimEntry): BatchClaimEntry {
  return {
    index: requireUint256("index", entry.index),
    period: requireUint256("period", entry.period),
    amount: requireUint256("amount", entry.amount),
    proof: requireProof(entry.proof),
  };
}

/** Steps 1–4 for one entry. Throws on duplicate or bad proof. */
function settleEntry(ctx: DistributorContext, account: Address, input: BatchClaimEntry): BatchClaimEntry {
  const { bitmap, roots } = ctx.store;
  const entry = checkEntry(input);
  const where = { period: entry.period.toString(), index: entry.index.toString() };

  if (bitmap.isClaimed(entry.period, entry.index)) {
    throw new DistributorError(
      "ALREADY_CLAIMED",
      `index ${where.index} already claimed for period ${where.period}`,
      where,
    );
  }

  const leaf = leafHash(entry.index, account, entry.amount);
  if (!verifyMerkleProof(entry.proof, roots.rootOf(entry.period), leaf)) {
    throw new DistributorError(
      "INVALID_PROOF",
      `proof does not match root for period ${where.period}`,
      where,
    );
  }

  bitmap.markClaimed(entry.period, entry.index);
  return entry;
}

/** Move `amount` from custody to `account`; refusal or error → TRANSFER_FAILED. */
export async function payout(ctx: DistributorContext, account: Address, amount: bigint): Promise<void> {
  let ok: boolean;
  try {
    ok = await ctx.ledger.transfer(account, amount);
  } catch (err) {
    throw new DistributorError(
      "TRANSFER_FAILED",
      `ledger transfer errored: ${err instanceof Error ? err.message : String(err)}`,
      { account, amount: amount.toString() },
      { cause: err },
    );
  }
  if (!ok) {
    throw new DistributorError("TRANSFER_FAILED", "ledger refused transfer", {
      account,
      amount: amount.toString(),
    });
  }
}

function emitClaimed(ctx: DistributorContext, receipt: ClaimReceipt): void {
  ctx.store.events.emit({
    kind: EVENT_CLAIMED,
    payload: {
      period: receipt.period.toString(),
      index: receipt.index.toString(),
      account: receipt.account,
      amount: receipt.amount.toString(),
    },
  });
}

// ── Entry points ───────────────────────────────────────────────────

export async function claim(ctx: DistributorContext, input: ClaimInput): Promise<ClaimReceipt> {
  const account = requireAccount("account", input.account);

  const entry = settleEntry(ctx, account, input);
  await payout(ctx, account, entry.amount);

  const receipt: ClaimReceipt = {
    period: entry.period,
    index: entry.index,
    account,
    amount: entry.amount,
  };
  emitClaimed(ctx, receipt);
  return receipt;
}

/**
 * Claim several entries for one account, paid as a single transfer of the
 * summed amounts. All-or-nothing: any failing entry aborts the batch.
 */
export async function claimBatch(
  ctx: DistributorContext,
  accountInput: Address,
  entries: readonly BatchClaimEntry[],
): Promise<BatchReceipt> {
  if (entries.length === 0) {
    throw new DistributorError("EMPTY_BATCH", "batch has no entries");
  }
  if (entries.length > MAX_BATCH_ENTRIES) {
    throw new DistributorError("BATCH_TOO_LARGE", `batch exceeds ${MAX_BATCH_ENTRIES} entries`, {
      entries: entries.length,
    });
  }

  const account = requireAccount("account", accountInput);
  const claims: ClaimReceipt[] = [];
  let total = 0n;

  for (const input of entries) {
    const entry = settleEntry(ctx, account, input);
    const receipt: ClaimReceipt = {
      period: entry.period,
      index: entry.index,
      account,
      amount: entry.amount,
    };
    emitClaimed(ctx, receipt);
    claims.push(receipt);
    total += entry.amount;
  }
  requireUint256("total", total);

  await payout(ctx, account, total);

  return { account, total, claims };
}
