/**
 * Shared distributor test fixtures: two seeded-period trees, a mock ledger
 * with a funded admin, and a ready Distributor.
 */

import { MockTokenLedger } from "@rootdrop/ledger-client";
import type { Entitlement } from "@rootdrop/primitives";
import { Distributor, type DistributorLogger } from "../src/distributor.js";
import {
  buildEntitlementTree,
  getProof,
  testAddress,
  type TestTree,
} from "../../../packages/primitives/test/helpers/tree.js";

export const CUSTODY = testAddress(0xc0);
export const ADMIN = testAddress(0xad);
export const FUNDER = testAddress(0xf0);
export const ALICE = testAddress(0xa1);
export const BOB = testAddress(0xb0);
export const MALLORY = testAddress(0xee);

export const PERIOD_A = 10n;
export const PERIOD_B = 11n;

/** Indices 0..7; even indices belong to ALICE, odd to BOB. */
function entitlementsFor(period: bigint): Entitlement[] {
  return Array.from({ length: 8 }, (_, i) => ({
    index: BigInt(i),
    account: i % 2 === 0 ? ALICE : BOB,
    amount: BigInt(i + 1) * 100n + period,
  }));
}

export interface PeriodFixture {
  period: bigint;
  entitlements: Entitlement[];
  tree: TestTree;
  total: bigint;
}

export function periodFixture(period: bigint): PeriodFixture {
  const entitlements = entitlementsFor(period);
  return {
    period,
    entitlements,
    tree: buildEntitlementTree(entitlements),
    total: entitlements.reduce((sum, e) => sum + e.amount, 0n),
  };
}

/** Claim input for position `i` of a period fixture. */
export function claimOf(fx: PeriodFixture, i: number) {
  const e = fx.entitlements[i];
  if (!e) throw new Error(`fixture: no entitlement ${i}`);
  return {
    index: e.index,
    account: e.account,
    period: fx.period,
    amount: e.amount,
    proof: getProof(fx.tree, i),
  };
}

export interface Harness {
  ledger: MockTokenLedger;
  distributor: Distributor;
  a: PeriodFixture;
  b: PeriodFixture;
}

/** Distributor with PERIOD_A and PERIOD_B seeded and fully funded. */
export async function seededHarness(logger?: DistributorLogger): Promise<Harness> {
  const ledger = new MockTokenLedger(CUSTODY);
  const distributor = new Distributor({ ledger, custody: CUSTODY, owner: ADMIN, logger, now: () => 1_000 });
  const a = periodFixture(PERIOD_A);
  const b = periodFixture(PERIOD_B);

  ledger.mint(FUNDER, a.total + b.total);
  ledger.approve(FUNDER, CUSTODY, a.total + b.total);

  for (const fx of [a, b]) {
    await distributor.seed(ADMIN, {
      period: fx.period,
      root: fx.tree.root,
      totalAllocation: fx.total,
      fundingSource: FUNDER,
    });
  }

  ledger.calls.length = 0;
  return { ledger, distributor, a, b };
}

export { getProof };
