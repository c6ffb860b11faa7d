/**
 * rootdrop roots <from> <to>
 *
 * GET /roots?from=&to= → one line per period.
 */

import { isZeroHash, parseUint256 } from "@rootdrop/primitives";
import type { CliConfig } from "../lib/config.js";
import { httpGet } from "../lib/http.js";

interface RootsResponse {
  from: string;
  to: string;
  roots: string[];
}

export async function rootsCommand(from: string, to: string, config: CliConfig): Promise<string[]> {
  const params = new URLSearchParams({
    from: parseUint256(from).toString(),
    to: parseUint256(to).toString(),
  });

  const res = await httpGet<RootsResponse>(`${config.distributor}/roots?${params.toString()}`);
  const start = parseUint256(res.from);
  res.roots.forEach((root, i) => {
    const period = (start + BigInt(i)).toString();
    console.log(`  ${period.padStart(8)}  ${isZeroHash(root) ? "(unset)" : root}`);
  });
  return res.roots;
}
