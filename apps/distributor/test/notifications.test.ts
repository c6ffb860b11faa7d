/**
 * Committed-event listeners: what subscribers see, and when.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { EVENT_CLAIMED, type DistributorEventV1 } from "@rootdrop/primitives";
import { ALICE, claimOf, seededHarness, type Harness } from "./fixtures.js";

const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };

let h: Harness;
let seen: DistributorEventV1[];

beforeEach(async () => {
  vi.clearAllMocks();
  h = await seededHarness(logger);
  seen = [];
});

describe("subscribe", () => {
  it("delivers each committed event once, in order", async () => {
    h.distributor.subscribe((event) => seen.push(event));

    await h.distributor.claim(claimOf(h.a, 0));
    expect(seen).toEqual([
      {
        seq: 3,
        timestamp: 1_000,
        kind: EVENT_CLAIMED,
        payload: { period: "10", index: "0", account: ALICE, amount: "110" },
      },
    ]);

    await h.distributor.claimBatch(ALICE, [claimOf(h.a, 2), claimOf(h.b, 4)]);
    expect(seen.map((event) => event.seq)).toEqual([3, 4, 5]);
  });

  it("never delivers events of a rolled-back call", async () => {
    h.distributor.subscribe((event) => seen.push(event));

    h.ledger.failNext();
    await expect(h.distributor.claim(claimOf(h.a, 0))).rejects.toMatchObject({ code: "TRANSFER_FAILED" });
    await expect(h.distributor.claimBatch(ALICE, [claimOf(h.a, 2), claimOf(h.a, 2)])).rejects.toMatchObject({
      code: "ALREADY_CLAIMED",
    });

    expect(seen).toEqual([]);
    expect(await h.distributor.eventCount()).toBe(2);
  });

  it("stops after unsubscribe", async () => {
    const unsubscribe = h.distributor.subscribe((event) => seen.push(event));
    await h.distributor.claim(claimOf(h.a, 0));
    unsubscribe();
    await h.distributor.claim(claimOf(h.a, 2));

    expect(seen.map((event) => event.seq)).toEqual([3]);
  });

  it("a throwing listener is logged and the others still run", async () => {
    const failure = new Error("listener down");
    h.distributor.subscribe(() => {
      throw failure;
    });
    h.distributor.subscribe((event) => seen.push(event));

    const receipt = await h.distributor.claim(claimOf(h.a, 0));

    expect(receipt.amount).toBe(110n);
    expect(seen).toHaveLength(1);
    expect(logger.error).toHaveBeenCalledWith({ err: failure }, "event listener failed");
  });
});
