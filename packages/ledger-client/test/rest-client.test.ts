/**
 * LedgerRestClient against an in-process HTTP stand-in.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { createServer, type Server } from "node:http";
import { LedgerRestClient } from "../src/rest-client.js";

const CUSTODY = "0x00000000000000000000000000000000000000c0";
const ALICE = "0x00000000000000000000000000000000000000a1";

interface Received {
  path: string;
  auth: string | undefined;
  body: unknown;
}

let server: Server;
let baseUrl: string;
const received: Received[] = [];
let nextResponse: { status: number; body: string } | "hang" = { status: 200, body: '{"ok":true}' };

beforeAll(async () => {
  server = createServer((req, res) => {
    let data = "";
    req.on("data", (chunk: Buffer) => (data += chunk.toString("utf-8")));
    req.on("end", () => {
      received.push({
        path: req.url ?? "",
        auth: req.headers.authorization,
        body: JSON.parse(data),
      });
      if (nextResponse === "hang") return;
      res.writeHead(nextResponse.status, { "content-type": "application/json" });
      res.end(nextResponse.body);
    });
  });
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("expected a TCP address");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

function client(apiKey = "test-key", timeoutMs?: number): LedgerRestClient {
  return new LedgerRestClient({ baseUrl, apiKey, custody: CUSTODY, timeoutMs });
}

describe("LedgerRestClient", () => {
  it("posts transfers with decimal amounts and bearer auth", async () => {
    nextResponse = { status: 200, body: '{"ok":true}' };
    received.length = 0;

    const ok = await client().transfer(ALICE, 10n ** 30n);

    expect(ok).toBe(true);
    expect(received).toEqual([
      {
        path: "/v1/transfer",
        auth: "Bearer test-key",
        body: { from: CUSTODY, to: ALICE, amount: "1000000000000000000000000000000" },
      },
    ]);
  });

  it("posts transferFrom with custody as spender", async () => {
    nextResponse = { status: 200, body: '{"ok":false}' };
    received.length = 0;

    const ok = await client("").transferFrom(ALICE, CUSTODY, 7n);

    expect(ok).toBe(false);
    expect(received[0]).toEqual({
      path: "/v1/transfer-from",
      auth: undefined,
      body: { spender: CUSTODY, from: ALICE, to: CUSTODY, amount: "7" },
    });
  });

  it("rejects on HTTP error status", async () => {
    nextResponse = { status: 503, body: "down" };
    await expect(client().transfer(ALICE, 1n)).rejects.toThrow("ledger POST /v1/transfer: 503 down");
  });

  it("rejects when `ok` is missing", async () => {
    nextResponse = { status: 200, body: "{}" };
    await expect(client().transfer(ALICE, 1n)).rejects.toThrow("response missing boolean `ok`");
  });

  it("rejects when the ledger never answers", async () => {
    nextResponse = "hang";
    await expect(client("test-key", 50).transfer(ALICE, 1n)).rejects.toThrow(
      "ledger POST /v1/transfer: no response after 50ms",
    );
  });
});
