/**
 * Claimed bitmap: one bit per (period, index).
 *
 * Indices are packed 256 to a word: word = index / 256, bit = index % 256.
 * Untouched words are implicitly zero (unclaimed). There is no upper bound
 * on index; any uint256 is addressable.
 *
 * A set bit is never cleared, except by the journal undoing a mark made
 * in the same (failed) call.
 */

import { BITMAP_WORD_BITS } from "@rootdrop/primitives";
import type { Journal } from "./journal.js";

export interface BitmapWord {
  word: bigint;
  bits: bigint;
}

export class ClaimBitmap {
  /** period → word index → 256-bit word */
  private readonly periods = new Map<bigint, Map<bigint, bigint>>();

  constructor(private readonly journal: Journal) {}

  isClaimed(period: bigint, index: bigint): boolean {
    const bits = this.periods.get(period)?.get(index / BITMAP_WORD_BITS) ?? 0n;
    return ((bits >> (index % BITMAP_WORD_BITS)) & 1n) === 1n;
  }

  /**
   * Set the bit for (period, index). Returns false if it was already set
   * (nothing changes); callers check isClaimed() first to report an error.
   */
  markClaimed(period: bigint, index: bigint): boolean {
    const wordIndex = index / BITMAP_WORD_BITS;
    const mask = 1n << (index % BITMAP_WORD_BITS);

    let words = this.periods.get(period);
    const createdPeriod = words === undefined;
    if (!words) {
      words = new Map();
      this.periods.set(period, words);
    }

    const previous = words.get(wordIndex) ?? 0n;
    if ((previous & mask) !== 0n) return false;

    words.set(wordIndex, previous | mask);

    const periodWords = words;
    this.journal.record(() => {
      if (previous === 0n) periodWords.delete(wordIndex);
      else periodWords.set(wordIndex, previous);
      if (createdPeriod) this.periods.delete(period);
    });

    return true;
  }

  /** Number of claimed indices in a period. */
  countClaimed(period: bigint): number {
    let count = 0;
    for (const bits of this.periods.get(period)?.values() ?? []) {
      for (let b = bits; b > 0n; b &= b - 1n) count++;
    }
    return count;
  }

  // ── Snapshot support ─────────────────────────────────────────

  /** Periods with at least one claimed index, ascending. */
  claimedPeriods(): bigint[] {
    return [...this.periods.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }

  /** Non-zero words of a period, ascending by word index. */
  words(period: bigint): BitmapWord[] {
    const words = this.periods.get(period);
    if (!words) return [];
    return [...words.entries()]
      .map(([word, bits]) => ({ word, bits }))
      .sort((a, b) => (a.word < b.word ? -1 : a.word > b.word ? 1 : 0));
  }

  /** Replace a period's words wholesale (snapshot restore; not journaled). */
  loadWords(period: bigint, words: readonly BitmapWord[]): void {
    const map = new Map<bigint, bigint>();
    for (const { word, bits } of words) {
      if (bits !== 0n) map.set(word, bits);
    }
    if (map.size > 0) this.periods.set(period, map);
    else this.periods.delete(period);
  }
}
