/**
 * rootdrop seed <period> <root> <total> <funding_source>
 *
 * POST /seed with the admin token. The service pulls <total> from
 * <funding_source>, which must have approved the distributor's custody
 * address beforehand.
 */

import { isAddress, isHash32, parseUint256 } from "@rootdrop/primitives";
import type { CliConfig } from "../lib/config.js";
import { httpPost } from "../lib/http.js";

interface SeedResponse {
  ok: boolean;
  period: string;
  root: string;
  total_allocation: string;
}

export async function seedCommand(
  period: string,
  root: string,
  total: string,
  source: string,
  config: CliConfig,
): Promise<SeedResponse> {
  if (!config.adminToken) {
    throw new Error("No admin token: set ROOTDROP_ADMIN_TOKEN or run `rootdrop config --admin-token <token>`");
  }
  if (!isHash32(root)) {
    throw new Error(`Invalid root: must be 0x + 64 hex chars. Got: ${root}`);
  }
  if (!isAddress(source)) {
    throw new Error(`Invalid funding source: must be 0x + 40 hex chars. Got: ${source}`);
  }

  const res = await httpPost<SeedResponse>(
    `${config.distributor}/seed`,
    {
      period: parseUint256(period).toString(),
      root,
      total_allocation: parseUint256(total).toString(),
      funding_source: source,
    },
    { authorization: `Bearer ${config.adminToken}` },
  );
  console.log(`Seeded period ${res.period}: ${res.root} (${res.total_allocation} allocated)`);
  return res;
}
