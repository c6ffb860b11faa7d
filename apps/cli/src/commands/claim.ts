/**
 * rootdrop claim <claim.json>
 *
 * POST /claim with the file's entitlement and proof.
 */

import type { CliConfig } from "../lib/config.js";
import { httpPost } from "../lib/http.js";
import { readClaimFile } from "../lib/claim-file.js";

interface ClaimResponse {
  ok: boolean;
  period: string;
  index: string;
  account: string;
  amount: string;
}

export async function claimCommand(path: string, config: CliConfig): Promise<ClaimResponse> {
  const { root: _root, ...claim } = await readClaimFile(path);

  const res = await httpPost<ClaimResponse>(`${config.distributor}/claim`, claim);
  console.log(`Claimed ${res.amount} → ${res.account} (period ${res.period}, index ${res.index})`);
  return res;
}
