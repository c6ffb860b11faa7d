import { describe, it, expect, beforeEach } from "vitest";
import { MAX_QUERY_SPAN, ZERO_HASH } from "@rootdrop/primitives";
import { DistributorError } from "../src/errors.js";
import { PERIOD_A, PERIOD_B, claimOf, seededHarness, type Harness } from "./fixtures.js";

let h: Harness;

beforeEach(async () => {
  h = await seededHarness();
  await h.distributor.claim(claimOf(h.a, 5));
  await h.distributor.claim(claimOf(h.b, 7));
});

describe("claimStatus", () => {
  it("pairs indices with periods positionally", async () => {
    expect(await h.distributor.claimStatus([5n, 7n], PERIOD_A, PERIOD_B)).toEqual([true, true]);
    expect(await h.distributor.claimStatus([7n, 5n], PERIOD_A, PERIOD_B)).toEqual([false, false]);
    expect(await h.distributor.claimStatus([5n, 5n], PERIOD_A, PERIOD_B)).toEqual([true, false]);
  });

  it("single-period query", async () => {
    expect(await h.distributor.claimStatus([5n], PERIOD_A, PERIOD_A)).toEqual([true]);
  });

  it("unseeded periods read unclaimed", async () => {
    expect(await h.distributor.claimStatus([0n, 0n, 0n], 500n, 502n)).toEqual([false, false, false]);
  });

  it("rejects an indices list whose length differs from the span", async () => {
    const attempt = h.distributor.claimStatus([5n, 7n, 9n], PERIOD_A, PERIOD_B);
    await expect(attempt).rejects.toBeInstanceOf(DistributorError);
    await expect(attempt).rejects.toMatchObject({ code: "LENGTH_MISMATCH" });
  });

  it("rejects a reversed range", async () => {
    await expect(h.distributor.claimStatus([], PERIOD_B, PERIOD_A)).rejects.toMatchObject({
      code: "INVALID_RANGE",
    });
  });

  it("rejects indices and periods outside uint256", async () => {
    await expect(h.distributor.claimStatus([-1n], PERIOD_A, PERIOD_A)).rejects.toMatchObject({
      code: "INVALID_INPUT",
      details: { field: "indices[0]" },
    });
    await expect(h.distributor.claimStatus([0n, 2n ** 256n], PERIOD_A, PERIOD_B)).rejects.toMatchObject({
      code: "INVALID_INPUT",
      details: { field: "indices[1]" },
    });
    await expect(h.distributor.claimStatus([0n], -1n, -1n)).rejects.toMatchObject({
      code: "INVALID_INPUT",
      details: { field: "period_begin" },
    });
  });

  it("rejects a span above the query limit", async () => {
    const indices = Array.from({ length: MAX_QUERY_SPAN + 1 }, () => 0n);
    await expect(
      h.distributor.claimStatus(indices, 0n, BigInt(MAX_QUERY_SPAN)),
    ).rejects.toMatchObject({ code: "RANGE_TOO_LARGE" });
  });
});

describe("merkleRoots", () => {
  it("returns stored roots and zero for unseeded periods", async () => {
    const roots = await h.distributor.merkleRoots(9n, 12n);
    expect(roots).toEqual([ZERO_HASH, h.a.tree.root, h.b.tree.root, ZERO_HASH]);
  });

  it("single period", async () => {
    expect(await h.distributor.merkleRoots(PERIOD_B, PERIOD_B)).toEqual([h.b.tree.root]);
  });

  it("accepts exactly the query limit", async () => {
    const roots = await h.distributor.merkleRoots(1n, BigInt(MAX_QUERY_SPAN));
    expect(roots).toHaveLength(MAX_QUERY_SPAN);
    expect(roots[9]).toBe(h.a.tree.root);
  });

  it("rejects reversed and oversized ranges", async () => {
    await expect(h.distributor.merkleRoots(12n, 9n)).rejects.toMatchObject({ code: "INVALID_RANGE" });
    await expect(h.distributor.merkleRoots(0n, BigInt(MAX_QUERY_SPAN))).rejects.toMatchObject({
      code: "RANGE_TOO_LARGE",
    });
  });
});

describe("rootOf / isClaimed", () => {
  it("reads committed state", async () => {
    expect(await h.distributor.rootOf(PERIOD_A)).toBe(h.a.tree.root);
    expect(await h.distributor.rootOf(3n)).toBe(ZERO_HASH);
    expect(await h.distributor.isClaimed(PERIOD_B, 7n)).toBe(true);
    expect(await h.distributor.isClaimed(PERIOD_B, 6n)).toBe(false);
  });
});
