/**
 * State file: a snapshot plus an append-only log of committed calls.
 *
 *   <path>      { version, commit, state }   full store, rewritten on compaction
 *   <path>.log  one CommitRecordV1 per line  calls committed since that snapshot
 *
 * Each committed call appends one line. The snapshot is rewritten
 * (temp file, then rename) and the log emptied once the log holds as many
 * records as the snapshot already covers, and at least `compactEvery`.
 * Records numbered at or below the snapshot's commit are skipped on load.
 * Missing files mean a fresh deployment.
 */

import { appendFile, mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { DistributorEventV1 } from "@rootdrop/primitives";
import { CommitRecordV1, StateSnapshotV1, type DistributorStore } from "./store.js";

export const StateFileV1 = Type.Object(
  {
    version: Type.Literal(1),
    /** Last commit folded into `state`. */
    commit: Type.Integer({ minimum: 0 }),
    state: StateSnapshotV1,
  },
  { additionalProperties: false },
);

export type StateFileV1 = Static<typeof StateFileV1>;

export interface StateFileOptions {
  /** Minimum log length before compaction. Default 1 000. */
  compactEvery?: number;
}

export class StateFile {
  readonly logPath: string;
  private readonly compactEvery: number;
  /** Last commit written to disk. */
  private commit = 0;
  /** Commit number covered by the current snapshot. */
  private compactedAt = 0;
  private logRecords = 0;

  constructor(
    private readonly path: string,
    opts: StateFileOptions = {},
  ) {
    this.logPath = `${path}.log`;
    this.compactEvery = opts.compactEvery ?? 1_000;
  }

  /** Load snapshot and log into a fresh `store`. Returns false if neither exists. */
  async load(store: DistributorStore): Promise<boolean> {
    const snapshot = await readIfExists(this.path);
    const log = await readIfExists(this.logPath);
    if (snapshot === null && log === null) return false;

    if (snapshot !== null) {
      const raw: unknown = JSON.parse(snapshot);
      if (!Value.Check(StateFileV1, raw)) {
        const first = Value.Errors(StateFileV1, raw).First();
        throw new Error(`${this.path}: invalid at ${first?.path || "/"}: ${first?.message ?? "unknown"}`);
      }
      store.restore(raw.state);
      this.commit = raw.commit;
      this.compactedAt = raw.commit;
    }

    if (log !== null) {
      log.split("\n").forEach((line, i) => {
        if (line === "") return;
        const where = `${this.logPath}:${i + 1}`;
        const record = parseLine(line, where);
        if (!Value.Check(CommitRecordV1, record)) {
          throw new Error(`${where}: invalid commit record`);
        }
        if (record.commit <= this.commit) return;
        if (record.commit !== this.commit + 1) {
          throw new Error(`${where}: expected commit ${this.commit + 1}, got ${record.commit}`);
        }
        store.applyCommit(record);
        this.commit = record.commit;
        this.logRecords++;
      });
    }
    return true;
  }

  /** Record one committed call, compacting when the log has grown enough. */
  async append(store: DistributorStore, events: readonly DistributorEventV1[]): Promise<void> {
    const { owner, pendingOwner } = store.ownership.snapshot();
    const record: CommitRecordV1 = {
      commit: this.commit + 1,
      owner,
      pending_owner: pendingOwner,
      events: [...events],
    };

    await mkdir(dirname(this.logPath), { recursive: true });
    await appendFile(this.logPath, JSON.stringify(record) + "\n", "utf-8");
    this.commit = record.commit;
    this.logRecords++;

    if (this.logRecords >= Math.max(this.compactEvery, this.compactedAt)) {
      await this.compact(store);
    }
  }

  /** Write the whole store as the snapshot and empty the log. */
  async compact(store: DistributorStore): Promise<void> {
    const doc: StateFileV1 = { version: 1, commit: this.commit, state: store.snapshot() };

    await mkdir(dirname(this.path), { recursive: true });
    const tmp = `${this.path}.tmp`;
    await writeFile(tmp, JSON.stringify(doc) + "\n", "utf-8");
    await rename(tmp, this.path);
    await writeFile(this.logPath, "", "utf-8");

    this.compactedAt = this.commit;
    this.logRecords = 0;
  }
}

function parseLine(line: string, where: string): unknown {
  try {
    return JSON.parse(line);
  } catch (err) {
    throw new Error(`${where}: not JSON`, { cause: err });
  }
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}
