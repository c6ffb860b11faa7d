/**
 * Distributor: the stateful core behind the HTTP service.
 *
 * Owns: root registry, claimed bitmap, ownership, event log.
 * Every mutating entry point runs through the transaction executor, so it
 * is serialized against other calls and either commits fully or not at all.
 * Reads wait for in-flight calls and see committed state only.
 *
 * With a state file configured, each commit is appended to its log. If that
 * write fails, mutating calls are refused with UNAVAILABLE until a full
 * compaction succeeds; reads keep working.
 */

import { pino, type Logger } from "pino";
import {
  EVENT_OWNERSHIP_TRANSFERRED,
  normalizeAddress,
  type Address,
  type DistributorEventV1,
  type Hash32,
} from "@rootdrop/primitives";
import type { TokenLedger } from "@rootdrop/ledger-client";
import { DistributorStore } from "./state/store.js";
import type { StateFile } from "./state/state-file.js";
import { TransactionExecutor } from "./executor.js";
import { DistributorError, isDistributorError } from "./errors.js";
import type { EventListener } from "./event-log/writer.js";
import type { DistributorContext } from "./views/context.js";
import {
  claim,
  claimBatch,
  type BatchClaimEntry,
  type BatchReceipt,
  type ClaimInput,
  type ClaimReceipt,
} from "./views/claims.js";
import { seed, type SeedInput, type SeedResult } from "./views/seeding.js";
import { claimStatus, merkleRoots } from "./views/queries.js";

export type DistributorLogger = Pick<Logger, "info" | "warn" | "error" | "debug">;

export interface DistributorOptions {
  ledger: TokenLedger;
  /** This distributor's own ledger address. */
  custody: Address;
  /** Initial owner. Ignored when a snapshot is loaded. */
  owner: Address | null;
  /** Persist every commit. */
  stateFile?: StateFile | null;
  logger?: DistributorLogger;
  /** Clock for event timestamps. */
  now?: () => number;
}

export class Distributor {
  private readonly store: DistributorStore;
  private readonly ctx: DistributorContext;
  private readonly executor: TransactionExecutor;
  private readonly stateFile: StateFile | null;
  private readonly log: DistributorLogger;
  /** Set when a commit could not be written; cleared by a successful compaction. */
  private persistFailed = false;

  constructor(opts: DistributorOptions) {
    this.store = new DistributorStore(opts.owner, opts.now);
    this.stateFile = opts.stateFile ?? null;
    this.log = opts.logger ?? pino({ level: "silent" });
    this.ctx = {
      store: this.store,
      ledger: opts.ledger,
      custody: normalizeAddress(opts.custody),
    };
    this.executor = new TransactionExecutor(this.store.journal, {
      onCommit: () => this.afterCommit(),
      onRollback: (err) => {
        if (isDistributorError(err)) {
          this.log.info({ code: err.code, details: err.details }, "call rolled back");
        } else {
          this.log.warn({ err }, "call rolled back on unexpected error");
        }
      },
    });
  }

  /** Load persisted state, if a state file is configured and exists. */
  async init(): Promise<void> {
    if (!this.stateFile) return;
    const loaded = await this.stateFile.load(this.store);
    this.log.info(
      { loaded, roots: this.store.roots.size, events: this.store.events.count() },
      loaded ? "state restored from disk" : "no state file found, starting empty",
    );
  }

  // ── Mutating entry points ──────────────────────────────────────

  seed(caller: Address, input: SeedInput): Promise<SeedResult> {
    return this.mutate(() => seed(this.ctx, caller, input));
  }

  claim(input: ClaimInput): Promise<ClaimReceipt> {
    return this.mutate(() => claim(this.ctx, input));
  }

  claimBatch(account: Address, entries: readonly BatchClaimEntry[]): Promise<BatchReceipt> {
    return this.mutate(() => claimBatch(this.ctx, account, entries));
  }

  transferOwnership(caller: Address, newOwner: Address): Promise<void> {
    return this.mutate(() => {
      this.store.ownership.transferOwnership(caller, newOwner);
    });
  }

  acceptOwnership(caller: Address): Promise<void> {
    return this.mutate(() => {
      const previous = this.store.ownership.acceptOwnership(caller);
      this.emitOwnershipTransferred(previous, this.store.ownership.owner());
    });
  }

  renounceOwnership(caller: Address): Promise<void> {
    return this.mutate(() => {
      const previous = this.store.ownership.renounceOwnership(caller);
      this.emitOwnershipTransferred(previous, null);
    });
  }

  // ── Reads ──────────────────────────────────────────────────────

  isClaimed(period: bigint, index: bigint): Promise<boolean> {
    return this.executor.read(() => this.store.bitmap.isClaimed(period, index));
  }

  rootOf(period: bigint): Promise<Hash32> {
    return this.executor.read(() => this.store.roots.rootOf(period));
  }

  claimStatus(indices: readonly bigint[], periodBegin: bigint, periodEnd: bigint): Promise<boolean[]> {
    return this.executor.read(() => claimStatus(this.store, indices, periodBegin, periodEnd));
  }

  merkleRoots(periodBegin: bigint, periodEnd: bigint): Promise<Hash32[]> {
    return this.executor.read(() => merkleRoots(this.store, periodBegin, periodEnd));
  }

  owner(): Promise<Address | null> {
    return this.executor.read(() => this.store.ownership.owner());
  }

  pendingOwner(): Promise<Address | null> {
    return this.executor.read(() => this.store.ownership.pendingOwner());
  }

  events(since: number, limit: number): Promise<DistributorEventV1[]> {
    return this.executor.read(() => this.store.events.since(since, limit));
  }

  eventCount(): Promise<number> {
    return this.executor.read(() => this.store.events.count());
  }

  /** Listen for committed notifications. Returns an unsubscribe function. */
  subscribe(listener: EventListener): () => void {
    return this.store.events.subscribe(listener);
  }

  // ── Internals ──────────────────────────────────────────────────

  private emitOwnershipTransferred(previous: Address | null, next: Address | null): void {
    this.store.events.emit({
      kind: EVENT_OWNERSHIP_TRANSFERRED,
      payload: { previous_owner: previous, new_owner: next },
    });
  }

  private mutate<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.executor.run(async () => {
      await this.ensurePersisted();
      return fn();
    });
  }

  private async ensurePersisted(): Promise<void> {
    if (!this.persistFailed || !this.stateFile) return;
    try {
      await this.stateFile.compact(this.store);
    } catch (err) {
      throw new DistributorError(
        "UNAVAILABLE",
        "state could not be written; refusing changes until it can",
        {},
        { cause: err },
      );
    }
    this.persistFailed = false;
    this.log.info("state file recovered by compaction");
  }

  private async afterCommit(): Promise<void> {
    const appended = this.store.events.flush();
    for (const event of appended) {
      this.log.info({ seq: event.seq, kind: event.kind, ...event.payload }, "committed");
    }
    this.store.events.notify(appended, (err) => {
      this.log.error({ err }, "event listener failed");
    });

    if (!this.stateFile) return;
    try {
      await this.stateFile.append(this.store, appended);
    } catch (err) {
      this.persistFailed = true;
      this.log.error({ err }, "state write failed; refusing changes until it is rewritten");
    }
  }
}
