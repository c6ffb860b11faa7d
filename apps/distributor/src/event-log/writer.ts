/**
 * Event log: append-only record of committed state changes.
 *
 * Notifications are staged while a call runs and appended only when the
 * call commits. Failed or rolled-back attempts never appear.
 * Indexers page through the log by sequence number.
 */

import {
  EVENT_CLAIMED,
  EVENT_OWNERSHIP_TRANSFERRED,
  EVENT_ROOT_SEEDED,
  type ClaimedPayload,
  type DistributorEventV1,
  type OwnershipTransferredPayload,
  type RootSeededPayload,
} from "@rootdrop/primitives";
import type { Journal } from "../state/journal.js";

export type PendingEvent =
  | { kind: typeof EVENT_CLAIMED; payload: ClaimedPayload }
  | { kind: typeof EVENT_ROOT_SEEDED; payload: RootSeededPayload }
  | { kind: typeof EVENT_OWNERSHIP_TRANSFERRED; payload: OwnershipTransferredPayload };

export type EventListener = (event: DistributorEventV1) => void;

export class EventLog {
  private readonly committed: DistributorEventV1[] = [];
  private readonly staged: PendingEvent[] = [];
  private readonly listeners = new Set<EventListener>();

  constructor(
    private readonly journal: Journal,
    private readonly now: () => number = Date.now,
  ) {}

  /** Stage a notification; dropped if the enclosing call rolls back. */
  emit(event: PendingEvent): void {
    this.staged.push(event);
    this.journal.record(() => {
      this.staged.pop();
    });
  }

  /** Append staged notifications to the log (after commit). Returns the appended events. */
  flush(): DistributorEventV1[] {
    const timestamp = this.now();
    const appended: DistributorEventV1[] = this.staged.map((event, i) => ({
      ...event,
      seq: this.committed.length + i + 1,
      timestamp,
    }));
    this.staged.length = 0;
    this.committed.push(...appended);
    return appended;
  }

  /** Hand committed events to every listener. A throwing listener does not stop the others. */
  notify(events: readonly DistributorEventV1[], onError: (err: unknown) => void): void {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          onError(err);
        }
      }
    }
  }

  /** Events with seq > `since`, oldest first, at most `limit`. */
  since(since: number, limit: number): DistributorEventV1[] {
    return this.committed.slice(Math.max(0, since), Math.max(0, since) + limit);
  }

  count(): number {
    return this.committed.length;
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  all(): DistributorEventV1[] {
    return [...this.committed];
  }

  /** Snapshot restore. Sequence numbers must be 1..n in order. */
  load(events: readonly DistributorEventV1[]): void {
    this.committed.length = 0;
    for (const event of events) this.replay(event);
  }

  /** Re-append one already committed event (log replay). */
  replay(event: DistributorEventV1): void {
    const expected = this.committed.length + 1;
    if (event.seq !== expected) {
      throw new Error(`EventLog.replay: expected seq ${expected}, got ${event.seq}`);
    }
    this.committed.push(event);
  }
}
