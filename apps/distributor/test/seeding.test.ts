import { describe, it, expect, beforeEach } from "vitest";
import { EVENT_ROOT_SEEDED, ZERO_HASH } from "@rootdrop/primitives";
import { MockTokenLedger } from "@rootdrop/ledger-client";
import { Distributor } from "../src/distributor.js";
import { ADMIN, CUSTODY, FUNDER, MALLORY, periodFixture, type PeriodFixture } from "./fixtures.js";

let ledger: MockTokenLedger;
let distributor: Distributor;
let fx: PeriodFixture;

function seedInput(overrides: Partial<Parameters<Distributor["seed"]>[1]> = {}) {
  return {
    period: fx.period,
    root: fx.tree.root,
    totalAllocation: fx.total,
    fundingSource: FUNDER,
    ...overrides,
  };
}

beforeEach(() => {
  ledger = new MockTokenLedger(CUSTODY);
  distributor = new Distributor({ ledger, custody: CUSTODY, owner: ADMIN, now: () => 5_000 });
  fx = periodFixture(20n);
  ledger.mint(FUNDER, 10_000n);
  ledger.approve(FUNDER, CUSTODY, 10_000n);
});

describe("seed", () => {
  it("stores the root, pulls the funding and emits RootSeeded", async () => {
    const result = await distributor.seed(ADMIN, seedInput());

    expect(result).toEqual({ period: 20n, root: fx.tree.root, totalAllocation: fx.total });
    expect(await distributor.rootOf(20n)).toBe(fx.tree.root);
    expect(ledger.balanceOf(CUSTODY)).toBe(fx.total);
    expect(ledger.allowance(FUNDER, CUSTODY)).toBe(10_000n - fx.total);
    expect(await distributor.events(0, 10)).toEqual([
      {
        seq: 1,
        timestamp: 5_000,
        kind: EVENT_ROOT_SEEDED,
        payload: {
          period: "20",
          root: fx.tree.root,
          total_allocation: fx.total.toString(),
          funding_source: FUNDER,
        },
      },
    ]);
  });

  it("a second seed for the same period fails and keeps the first root", async () => {
    await distributor.seed(ADMIN, seedInput());
    const other = periodFixture(21n).tree.root;

    await expect(distributor.seed(ADMIN, seedInput({ root: other }))).rejects.toMatchObject({
      code: "ROOT_ALREADY_SET",
    });
    expect(await distributor.rootOf(20n)).toBe(fx.tree.root);
    expect(ledger.calls).toHaveLength(1);
  });

  it("only the owner can seed", async () => {
    await expect(distributor.seed(MALLORY, seedInput())).rejects.toMatchObject({ code: "UNAUTHORIZED" });
    expect(await distributor.rootOf(20n)).toBe(ZERO_HASH);
    expect(ledger.calls).toEqual([]);
  });

  it("rejects the zero root", async () => {
    await expect(distributor.seed(ADMIN, seedInput({ root: ZERO_HASH }))).rejects.toMatchObject({
      code: "INVALID_ROOT",
    });
  });

  it("a refused funding pull leaves no root behind", async () => {
    ledger.failNext();
    await expect(distributor.seed(ADMIN, seedInput())).rejects.toMatchObject({ code: "TRANSFER_FAILED" });

    expect(await distributor.rootOf(20n)).toBe(ZERO_HASH);
    expect(await distributor.eventCount()).toBe(0);

    await distributor.seed(ADMIN, seedInput());
    expect(await distributor.rootOf(20n)).toBe(fx.tree.root);
  });

  it("insufficient allowance fails the seed", async () => {
    await expect(
      distributor.seed(ADMIN, seedInput({ totalAllocation: 10_001n })),
    ).rejects.toMatchObject({ code: "TRANSFER_FAILED" });
    expect(await distributor.rootOf(20n)).toBe(ZERO_HASH);
  });

  it("total allocation is not checked against the tree", async () => {
    await distributor.seed(ADMIN, seedInput({ totalAllocation: 1n }));
    expect(ledger.balanceOf(CUSTODY)).toBe(1n);
  });
});

describe("ownership", () => {
  it("two-step transfer: nominate, then accept", async () => {
    await distributor.transferOwnership(ADMIN, MALLORY);
    expect(await distributor.owner()).toBe(ADMIN);
    expect(await distributor.pendingOwner()).toBe(MALLORY);

    await distributor.acceptOwnership(MALLORY);
    expect(await distributor.owner()).toBe(MALLORY);
    expect(await distributor.pendingOwner()).toBeNull();

    await expect(distributor.seed(ADMIN, seedInput())).rejects.toMatchObject({ code: "UNAUTHORIZED" });
    await distributor.seed(MALLORY, seedInput());

    const [transferred] = await distributor.events(0, 1);
    expect(transferred?.payload).toEqual({ previous_owner: ADMIN, new_owner: MALLORY });
  });

  it("only the nominee can accept", async () => {
    await distributor.transferOwnership(ADMIN, MALLORY);
    await expect(distributor.acceptOwnership(FUNDER)).rejects.toMatchObject({ code: "UNAUTHORIZED" });
    expect(await distributor.owner()).toBe(ADMIN);
  });

  it("non-owner cannot nominate", async () => {
    await expect(distributor.transferOwnership(MALLORY, MALLORY)).rejects.toMatchObject({
      code: "UNAUTHORIZED",
    });
  });

  it("a malformed caller or nominee is invalid input", async () => {
    await expect(distributor.transferOwnership("0x1234", MALLORY)).rejects.toMatchObject({
      code: "INVALID_INPUT",
      details: { field: "caller" },
    });
    await expect(distributor.transferOwnership(ADMIN, "not-an-address")).rejects.toMatchObject({
      code: "INVALID_INPUT",
      details: { field: "new_owner" },
    });
    await expect(distributor.acceptOwnership("0xzz")).rejects.toMatchObject({ code: "INVALID_INPUT" });
    await expect(distributor.renounceOwnership("")).rejects.toMatchObject({ code: "INVALID_INPUT" });
    expect(await distributor.owner()).toBe(ADMIN);
    expect(await distributor.pendingOwner()).toBeNull();
  });

  it("renounce leaves no owner and disables seeding", async () => {
    await distributor.renounceOwnership(ADMIN);
    expect(await distributor.owner()).toBeNull();
    await expect(distributor.seed(ADMIN, seedInput())).rejects.toMatchObject({ code: "UNAUTHORIZED" });

    const [renounced] = await distributor.events(0, 1);
    expect(renounced?.payload).toEqual({ previous_owner: ADMIN, new_owner: null });
  });
});
