/**
 * Transaction executor: serializes entry points and makes each atomic.
 *
 * Ledger calls are async, so without a queue two requests could interleave
 * at an await. Every entry point therefore waits for the previous one.
 *
 * A mutating call made from *inside* a running transaction (the ledger's
 * transfer calling back into the distributor) is recognized through
 * AsyncLocalStorage and rejected before it touches any state. The ledger
 * effects of an inner call could not be undone if the outer call failed.
 * Reads from inside a transaction run inline.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { DistributorError } from "./errors.js";
import type { Journal } from "./state/journal.js";

interface TransactionFrame {
  /** Cleared when the outermost call settles; late callbacks queue normally. */
  open: boolean;
}

export interface ExecutorHooks {
  /** After the outermost call commits, still inside the queue. */
  onCommit?: () => Promise<void> | void;
  /** After the outermost call rolled back. */
  onRollback?: (err: unknown) => void;
}

export class TransactionExecutor {
  private readonly frames = new AsyncLocalStorage<TransactionFrame>();
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly journal: Journal,
    private readonly hooks: ExecutorHooks = {},
  ) {}

  /** Whether the caller is running inside an open transaction. */
  inTransaction(): boolean {
    return this.frames.getStore()?.open === true;
  }

  /** Run a mutating entry point atomically. Rejects when called re-entrantly. */
  run<T>(fn: () => Promise<T> | T): Promise<T> {
    if (this.inTransaction()) {
      return Promise.reject(
        new DistributorError("REENTRANT_CALL", "mutating call made from inside another call"),
      );
    }
    return this.enqueue(() => this.runOutermost(fn));
  }

  /** Run a read against a consistent (committed) view. */
  read<T>(fn: () => T): Promise<T> {
    if (this.inTransaction()) return Promise.resolve().then(fn);
    return this.enqueue(async () => fn());
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task);
    this.tail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private runOutermost<T>(fn: () => Promise<T> | T): Promise<T> {
    const frame: TransactionFrame = { open: true };

    return this.frames.run(frame, async () => {
      const savepoint = this.journal.savepoint();
      let value: T;
      try {
        value = await fn();
      } catch (err) {
        frame.open = false;
        this.journal.rollbackTo(savepoint);
        this.hooks.onRollback?.(err);
        throw err;
      }

      frame.open = false;
      this.journal.commit();
      await this.hooks.onCommit?.();
      return value;
    });
  }
}
