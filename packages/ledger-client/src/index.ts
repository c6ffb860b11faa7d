/**
 * @rootdrop/ledger-client: external token ledger abstraction.
 *
 * Distributor payouts call transfer(); seeding calls transferFrom().
 * Both go through the same TokenLedger interface.
 * Swap LedgerRestClient for MockTokenLedger in tests and dev mode.
 */

export type {
  TokenLedger,
  LedgerCall,
  LedgerRestClientOptions,
} from "./types.js";

export { LedgerRestClient } from "./rest-client.js";
export { MockTokenLedger, type TransferHook } from "./mock-client.js";
