/**
 * Token ledger interface: abstraction over the external fungible-token ledger.
 *
 * The distributor only ever calls transfer() (payouts from custody) and
 * transferFrom() (seeding pulls funds into custody). Both report refusal by
 * resolving false; transport failures reject. Callers treat both as failure.
 */

export interface TokenLedger {
  /** Push `amount` from the caller's custody to `to`. */
  transfer(to: string, amount: bigint): Promise<boolean>;
  /** Pull `amount` from `from` to `to`, against an allowance granted by `from`. */
  transferFrom(from: string, to: string, amount: bigint): Promise<boolean>;
}

export interface LedgerRestClientOptions {
  /** Ledger service base URL (e.g. "https://ledger.internal:8443"). */
  baseUrl: string;
  /** Bearer API key. Empty = no auth header (local dev only). */
  apiKey: string;
  /** The distributor's own custody address, sent as the transfer sender. */
  custody: string;
  /** Path to a CA certificate for the ledger's TLS. Empty = system CAs. */
  tlsCertPath?: string;
  /** Abort a request with no response after this many ms. Default 10 000. */
  timeoutMs?: number;
}

/** A single recorded ledger call (mock only). */
export interface LedgerCall {
  method: "transfer" | "transferFrom";
  from: string;
  to: string;
  amount: bigint;
  ok: boolean;
}
