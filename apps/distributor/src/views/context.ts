/**
 * What every view function operates on.
 */

import type { Address } from "@rootdrop/primitives";
import type { TokenLedger } from "@rootdrop/ledger-client";
import type { DistributorStore } from "../state/store.js";

export interface DistributorContext {
  store: DistributorStore;
  ledger: TokenLedger;
  /** This distributor's own ledger address. */
  custody: Address;
}
