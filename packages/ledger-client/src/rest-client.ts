/**
 * Ledger REST client: JSON over HTTP(S) + bearer key.
 *
 * Wraps a ledger service exposing:
 *   POST /v1/transfer       { from, to, amount }        → { ok }
 *   POST /v1/transfer-from  { spender, from, to, amount } → { ok }
 * Amounts are decimal strings (uint256 does not fit a JSON number).
 */

import { Agent as HttpsAgent, request as httpsRequest } from "node:https";
import { request as httpRequest, type IncomingMessage } from "node:http";
import { readFileSync } from "node:fs";
import type { TokenLedger, LedgerRestClientOptions } from "./types.js";

const DEFAULT_TIMEOUT_MS = 10_000;

export class LedgerRestClient implements TokenLedger {
  private readonly baseUrl: URL;
  private readonly apiKey: string;
  private readonly custody: string;
  private readonly agent: HttpsAgent | undefined;
  private readonly timeoutMs: number;

  constructor(opts: LedgerRestClientOptions) {
    this.baseUrl = new URL(opts.baseUrl);
    this.apiKey = opts.apiKey;
    this.custody = opts.custody.toLowerCase();
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.agent =
      this.baseUrl.protocol === "https:"
        ? new HttpsAgent(opts.tlsCertPath ? { ca: readFileSync(opts.tlsCertPath) } : {})
        : undefined;
  }

  /** Generic JSON POST helper. */
  private post(path: string, body: Record<string, string>): Promise<unknown> {
    const payload = JSON.stringify(body);
    const url = new URL(path, this.baseUrl);
    return new Promise((resolve, reject) => {
      const headers = {
        "Content-Type": "application/json",
        "Content-Length": Buffer.byteLength(payload),
        ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
      };

      const onResponse = (res: IncomingMessage): void => {
        let data = "";
        res.setEncoding("utf-8");
        res.on("data", (chunk: string) => (data += chunk));
        res.on("end", () => {
          if (res.statusCode && res.statusCode >= 400) {
            reject(new Error(`ledger POST ${path}: ${String(res.statusCode)} ${data}`));
            return;
          }
          try {
            resolve(JSON.parse(data));
          } catch {
            reject(new Error(`ledger POST ${path}: invalid JSON response`));
          }
        });
      };

      const req =
        url.protocol === "https:"
          ? httpsRequest(url, { method: "POST", agent: this.agent, headers }, onResponse)
          : httpRequest(url, { method: "POST", headers }, onResponse);
      req.setTimeout(this.timeoutMs, () => {
        req.destroy(new Error(`ledger POST ${path}: no response after ${String(this.timeoutMs)}ms`));
      });
      req.on("error", reject);
      req.write(payload);
      req.end();
    });
  }

  async transfer(to: string, amount: bigint): Promise<boolean> {
    const res = await this.post("/v1/transfer", {
      from: this.custody,
      to: to.toLowerCase(),
      amount: amount.toString(),
    });
    return readOk(res);
  }

  async transferFrom(from: string, to: string, amount: bigint): Promise<boolean> {
    const res = await this.post("/v1/transfer-from", {
      spender: this.custody,
      from: from.toLowerCase(),
      to: to.toLowerCase(),
      amount: amount.toString(),
    });
    return readOk(res);
  }
}

function readOk(res: unknown): boolean {
  if (typeof res === "object" && res !== null && "ok" in res && typeof res.ok === "boolean") {
    return res.ok;
  }
  throw new Error("ledger: response missing boolean `ok`");
}
