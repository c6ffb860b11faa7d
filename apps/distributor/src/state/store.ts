/**
 * Distributor store: the single owner of all persistent state.
 *
 * Fresh store: no roots (every period reads ZERO_HASH), no claimed bits,
 * empty event log. Every mutation goes through the shared journal.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import {
  EVENT_CLAIMED,
  EVENT_OWNERSHIP_TRANSFERRED,
  EVENT_ROOT_SEEDED,
  DecimalU256,
  DistributorEventV1,
  Hex32,
  HexAddress,
  fromHex,
  parseUint256,
  toHex,
  uint256ToBytes,
  bytesToUint256,
  type Address,
} from "@rootdrop/primitives";
import { Journal } from "./journal.js";
import { ClaimBitmap } from "./claim-bitmap.js";
import { RootRegistry } from "./root-registry.js";
import { Ownership } from "./ownership.js";
import { EventLog } from "../event-log/writer.js";

export const StateSnapshotV1 = Type.Object(
  {
    version: Type.Literal(1),
    owner: Type.Union([HexAddress, Type.Null()]),
    pending_owner: Type.Union([HexAddress, Type.Null()]),
    roots: Type.Array(Type.Object({ period: DecimalU256, root: Hex32 })),
    claimed: Type.Array(
      Type.Object({
        period: DecimalU256,
        /** word index → 256-bit word as 32-byte hex */
        words: Type.Array(Type.Object({ word: DecimalU256, bits: Hex32 })),
      }),
    ),
    events: Type.Array(DistributorEventV1),
  },
  { additionalProperties: false },
);

export type StateSnapshotV1 = Static<typeof StateSnapshotV1>;

/** One committed call: its events plus the ownership state it left behind. */
export const CommitRecordV1 = Type.Object(
  {
    commit: Type.Integer({ minimum: 1 }),
    owner: Type.Union([HexAddress, Type.Null()]),
    pending_owner: Type.Union([HexAddress, Type.Null()]),
    events: Type.Array(DistributorEventV1),
  },
  { additionalProperties: false },
);

export type CommitRecordV1 = Static<typeof CommitRecordV1>;

export class DistributorStore {
  readonly journal = new Journal();
  readonly bitmap = new ClaimBitmap(this.journal);
  readonly roots = new RootRegistry(this.journal);
  readonly ownership: Ownership;
  readonly events: EventLog;

  constructor(owner: Address | null, now: () => number = Date.now) {
    this.ownership = new Ownership(this.journal, owner);
    this.events = new EventLog(this.journal, now);
  }

  snapshot(): StateSnapshotV1 {
    const { owner, pendingOwner } = this.ownership.snapshot();
    return {
      version: 1,
      owner,
      pending_owner: pendingOwner,
      roots: this.roots.entries().map(({ period, root }) => ({ period: period.toString(), root })),
      claimed: this.bitmap.claimedPeriods().map((period) => ({
        period: period.toString(),
        words: this.bitmap.words(period).map(({ word, bits }) => ({
          word: word.toString(),
          bits: toHex(uint256ToBytes(bits)),
        })),
      })),
      events: this.events.all(),
    };
  }

  /** Load a snapshot into this (fresh) store. Throws if the snapshot is malformed. */
  restore(raw: unknown): void {
    if (!Value.Check(StateSnapshotV1, raw)) {
      const first = Value.Errors(StateSnapshotV1, raw).First();
      throw new Error(`snapshot: invalid at ${first?.path ?? "/"}: ${first?.message ?? "unknown"}`);
    }
    if (this.roots.size > 0 || this.events.count() > 0 || this.bitmap.claimedPeriods().length > 0) {
      throw new Error("snapshot: store already holds state");
    }

    this.ownership.load({
      owner: raw.owner?.toLowerCase() ?? null,
      pendingOwner: raw.pending_owner?.toLowerCase() ?? null,
    });
    this.roots.load(raw.roots.map(({ period, root }) => ({ period: parseUint256(period), root })));
    for (const { period, words } of raw.claimed) {
      this.bitmap.loadWords(
        parseUint256(period),
        words.map(({ word, bits }) => ({ word: parseUint256(word), bits: bytesToUint256(fromHex(bits)) })),
      );
    }
    this.events.load(raw.events);
  }

  /**
   * Re-apply a committed call from the state log. Claims and seeds are
   * rebuilt from their events; ownership is taken from the record.
   */
  applyCommit(record: CommitRecordV1): void {
    for (const event of record.events) {
      switch (event.kind) {
        case EVENT_CLAIMED: {
          const period = parseUint256(event.payload.period);
          const index = parseUint256(event.payload.index);
          if (!this.bitmap.markClaimed(period, index)) {
            throw new Error(`state log: index ${index.toString()} of period ${period.toString()} claimed twice`);
          }
          break;
        }
        case EVENT_ROOT_SEEDED:
          this.roots.insert(parseUint256(event.payload.period), event.payload.root);
          break;
        case EVENT_OWNERSHIP_TRANSFERRED:
          break;
      }
      this.events.replay(event);
    }

    this.ownership.load({
      owner: record.owner?.toLowerCase() ?? null,
      pendingOwner: record.pending_owner?.toLowerCase() ?? null,
    });
    this.journal.commit();
  }
}
