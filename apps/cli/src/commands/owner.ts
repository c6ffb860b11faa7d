/**
 * rootdrop owner [transfer <address> | accept | renounce]
 *
 * Shows the distributor's owner, or drives the two-step ownership handover.
 * Every change needs the admin token of the identity making it: the owner
 * nominates or renounces, the nominee accepts.
 */

import { isAddress } from "@rootdrop/primitives";
import type { CliConfig } from "../lib/config.js";
import { httpGet, httpPost } from "../lib/http.js";

export interface OwnerResponse {
  owner: string | null;
  pending_owner: string | null;
}

function print(res: OwnerResponse): void {
  console.log(`Owner:         ${res.owner ?? "(none)"}`);
  console.log(`Pending owner: ${res.pending_owner ?? "(none)"}`);
}

function authHeader(config: CliConfig): Record<string, string> {
  if (!config.adminToken) {
    throw new Error("No admin token: set ROOTDROP_ADMIN_TOKEN or run `rootdrop config --admin-token <token>`");
  }
  return { authorization: `Bearer ${config.adminToken}` };
}

export async function ownerCommand(config: CliConfig): Promise<OwnerResponse> {
  const res = await httpGet<OwnerResponse>(`${config.distributor}/owner`);
  print(res);
  return res;
}

export async function ownerTransferCommand(newOwner: string, config: CliConfig): Promise<OwnerResponse> {
  if (!isAddress(newOwner)) {
    throw new Error(`Invalid address: must be 0x + 40 hex chars. Got: ${newOwner}`);
  }
  const res = await httpPost<OwnerResponse>(
    `${config.distributor}/owner/transfer`,
    { new_owner: newOwner },
    authHeader(config),
  );
  print(res);
  console.log("The nominee must run `rootdrop owner accept` with their own token.");
  return res;
}

export async function ownerAcceptCommand(config: CliConfig): Promise<OwnerResponse> {
  const res = await httpPost<OwnerResponse>(`${config.distributor}/owner/accept`, {}, authHeader(config));
  print(res);
  return res;
}

export async function ownerRenounceCommand(config: CliConfig): Promise<OwnerResponse> {
  const res = await httpPost<OwnerResponse>(`${config.distributor}/owner/renounce`, {}, authHeader(config));
  print(res);
  return res;
}
