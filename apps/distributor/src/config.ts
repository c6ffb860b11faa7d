/**
 * Distributor configuration.
 * All env access centralized here; no direct process.env elsewhere.
 */

import { ZERO_ADDRESS, normalizeAddress } from "@rootdrop/primitives";
import type { AdminCredential } from "./routes/auth.js";

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

/**
 * Admin credentials: ADMIN_ADDRESS/ADMIN_TOKEN plus any
 * OPERATOR_CREDENTIALS ("0xaddr=token,0xaddr=token"), e.g. for a nominee
 * who must accept ownership over HTTP.
 */
export function parseCredentials(adminAddress: string, adminToken: string, operators: string): AdminCredential[] {
  const credentials: AdminCredential[] = [];
  if (adminToken) credentials.push({ address: normalizeAddress(adminAddress), token: adminToken });
  for (const entry of operators.split(",")) {
    if (entry.trim() === "") continue;
    const eq = entry.indexOf("=");
    const token = eq < 0 ? "" : entry.slice(eq + 1).trim();
    if (token === "") throw new Error(`OPERATOR_CREDENTIALS: expected 0xaddr=token, got "${entry.trim()}"`);
    credentials.push({ address: normalizeAddress(entry.slice(0, eq).trim()), token });
  }
  return credentials;
}

export const config = {
  port: parseInt(env("DISTRIBUTOR_PORT", "3200"), 10),
  host: env("DISTRIBUTOR_HOST", "0.0.0.0"),
  /** This distributor's own ledger address (holds seeded funds). */
  custodyAddress: normalizeAddress(env("CUSTODY_ADDRESS", ZERO_ADDRESS)),
  /** Initial owner; the only identity allowed to seed. */
  adminAddress: normalizeAddress(env("ADMIN_ADDRESS", ZERO_ADDRESS)),
  /** Bearer tokens for admin routes. ADMIN_TOKEN empty = none for the admin. */
  adminCredentials: parseCredentials(
    env("ADMIN_ADDRESS", ZERO_ADDRESS),
    env("ADMIN_TOKEN", ""),
    env("OPERATOR_CREDENTIALS", ""),
  ),
  /** Ledger service base URL. Empty = dev mode (in-memory ledger). */
  ledgerUrl: env("LEDGER_URL", ""),
  ledgerApiKey: env("LEDGER_API_KEY", ""),
  ledgerTlsCertPath: env("LEDGER_TLS_CERT_PATH", ""),
  /** Ledger requests with no response after this long fail the call. */
  ledgerTimeoutMs: parseInt(env("LEDGER_TIMEOUT_MS", "10000"), 10),
  /** State file (snapshot, plus `<path>.log`). Empty = state lives in memory only. */
  statePath: env("STATE_PATH", ""),
} as const;
