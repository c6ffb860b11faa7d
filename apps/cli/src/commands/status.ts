/**
 * rootdrop status <period> <index>
 *
 * GET /claimed/:period/:index
 */

import { parseUint256 } from "@rootdrop/primitives";
import type { CliConfig } from "../lib/config.js";
import { httpGet } from "../lib/http.js";

interface StatusResponse {
  period: string;
  index: string;
  claimed: boolean;
}

export async function statusCommand(period: string, index: string, config: CliConfig): Promise<boolean> {
  const p = parseUint256(period).toString();
  const i = parseUint256(index).toString();

  const res = await httpGet<StatusResponse>(`${config.distributor}/claimed/${p}/${i}`);
  console.log(`period ${res.period} index ${res.index}: ${res.claimed ? "claimed" : "unclaimed"}`);
  return res.claimed;
}
