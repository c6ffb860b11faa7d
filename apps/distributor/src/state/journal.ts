/**
 * Undo journal: makes a call's state changes all-or-nothing.
 *
 * Every mutation records an undo closure. On failure the journal unwinds
 * (LIFO) back to a savepoint; on commit the undo log is discarded.
 * Nested (re-entrant) calls take their own savepoint inside the outer one.
 */

export type Undo = () => void;

export class Journal {
  private readonly undos: Undo[] = [];

  record(undo: Undo): void {
    this.undos.push(undo);
  }

  /** Current position; pass to rollbackTo() to undo everything after it. */
  savepoint(): number {
    return this.undos.length;
  }

  rollbackTo(savepoint: number): void {
    while (this.undos.length > savepoint) {
      const undo = this.undos.pop();
      if (undo) undo();
    }
  }

  /** Discard the undo log. Changes become permanent. */
  commit(): void {
    this.undos.length = 0;
  }

  /** Number of uncommitted changes. */
  get size(): number {
    return this.undos.length;
  }
}
