/**
 * Bearer-token authentication for admin routes.
 *
 * Each credential binds a token to the address it acts as. The core still
 * decides what that address may do (owner, pending owner).
 */

import { timingSafeEqual } from "node:crypto";
import type { Address } from "@rootdrop/primitives";

export interface AdminCredential {
  address: Address;
  token: string;
}

function tokenMatches(given: Buffer, expected: string): boolean {
  const want = Buffer.from(expected);
  return given.length === want.length && timingSafeEqual(given, want);
}

/** Address whose token is presented as `Authorization: Bearer <token>`, or null. */
export function resolveCaller(header: string | undefined, credentials: readonly AdminCredential[]): Address | null {
  if (!header?.startsWith("Bearer ")) return null;
  const given = Buffer.from(header.slice("Bearer ".length));
  if (given.length === 0) return null;
  for (const credential of credentials) {
    if (credential.token && tokenMatches(given, credential.token)) return credential.address;
  }
  return null;
}

