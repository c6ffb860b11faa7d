/**
 * Mock token ledger for testing and dev mode.
 *
 * Holds balances and allowances in memory. Share one instance between the
 * distributor and the test so both see the same balances. Use failNext()
 * to simulate a refused transfer and onTransfer() to run code in the middle
 * of a transfer (re-entrancy).
 */

import type { TokenLedger, LedgerCall } from "./types.js";

export type TransferHook = (call: { to: string; amount: bigint }) => Promise<void> | void;

export class MockTokenLedger implements TokenLedger {
  private readonly balances = new Map<string, bigint>();
  /** owner → spender → remaining allowance */
  private readonly allowances = new Map<string, Map<string, bigint>>();
  private readonly custody: string;
  private failures = 0;
  private hook: TransferHook | null = null;

  /** Every transfer/transferFrom call, in order, including refused ones. */
  readonly calls: LedgerCall[] = [];

  constructor(custody: string) {
    this.custody = custody.toLowerCase();
  }

  async transfer(to: string, amount: bigint): Promise<boolean> {
    const recipient = to.toLowerCase();

    if (this.hook) {
      await this.hook({ to: recipient, amount });
    }

    const ok = !this.consumeFailure() && this.move(this.custody, recipient, amount);
    this.calls.push({ method: "transfer", from: this.custody, to: recipient, amount, ok });
    return ok;
  }

  async transferFrom(from: string, to: string, amount: bigint): Promise<boolean> {
    const owner = from.toLowerCase();
    const recipient = to.toLowerCase();
    const allowed = this.allowance(owner, this.custody);

    let ok = false;
    if (!this.consumeFailure() && allowed >= amount && this.move(owner, recipient, amount)) {
      this.allowanceMap(owner).set(this.custody, allowed - amount);
      ok = true;
    }

    this.calls.push({ method: "transferFrom", from: owner, to: recipient, amount, ok });
    return ok;
  }

  // ── Test helpers ─────────────────────────────────────────────────

  /** Credit `amount` to `account` out of thin air. */
  mint(account: string, amount: bigint): void {
    const key = account.toLowerCase();
    this.balances.set(key, this.balanceOf(key) + amount);
  }

  /** `owner` authorizes `spender` to pull up to `amount`. */
  approve(owner: string, spender: string, amount: bigint): void {
    this.allowanceMap(owner.toLowerCase()).set(spender.toLowerCase(), amount);
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account.toLowerCase()) ?? 0n;
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(owner.toLowerCase())?.get(spender.toLowerCase()) ?? 0n;
  }

  /** Refuse the next `count` calls (resolve false, move nothing). */
  failNext(count = 1): void {
    this.failures += count;
  }

  /** Run `hook` inside every transfer(), before balances move. Pass null to clear. */
  onTransfer(hook: TransferHook | null): void {
    this.hook = hook;
  }

  private consumeFailure(): boolean {
    if (this.failures === 0) return false;
    this.failures--;
    return true;
  }

  private move(from: string, to: string, amount: bigint): boolean {
    const available = this.balanceOf(from);
    if (available < amount) return false;
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }

  private allowanceMap(owner: string): Map<string, bigint> {
    let map = this.allowances.get(owner);
    if (!map) {
      map = new Map();
      this.allowances.set(owner, map);
    }
    return map;
  }
}
