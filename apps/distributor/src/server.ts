/**
 * Distributor server: merkle distribution claims over HTTP.
 *
 * Owns: root registry, claimed bitmap, ownership, event log
 * (all inside one Distributor instance).
 *
 * Routes:
 *   POST /claim                  single claim (proof → bitmap → payout)
 *   POST /claim/batch            batched claims for one account, one payout
 *   POST /seed                   publish + fund a period root (owner token)
 *   GET  /owner                  current and pending owner
 *   POST /owner/transfer         nominate a new owner (owner token)
 *   POST /owner/accept           accept a nomination (nominee token)
 *   POST /owner/renounce         leave without an owner (owner token)
 *   GET  /roots/:period          root for one period
 *   GET  /roots?from=&to=        roots for a period range
 *   GET  /claimed/:period/:index  claim bit for one index
 *   POST /claimed/status         positional (index, period) claim bits
 *   GET  /events?since=&limit=   committed notifications, for indexers
 *   GET  /health                 health check
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify, { type FastifyInstance } from "fastify";
import {
  LedgerRestClient,
  MockTokenLedger,
  type TokenLedger,
} from "@rootdrop/ledger-client";
import { config } from "./config.js";
import { Distributor } from "./distributor.js";
import { HTTP_STATUS, isDistributorError } from "./errors.js";
import { StateFile } from "./state/state-file.js";
import { claimRoutes } from "./routes/claims.js";
import { seedRoutes } from "./routes/seed.js";
import { ownerRoutes } from "./routes/owner.js";
import type { AdminCredential } from "./routes/auth.js";
import { queryRoutes } from "./routes/queries.js";
import { eventRoutes } from "./routes/events.js";
import { healthRoutes } from "./routes/health.js";

/** Real ledger client from config, or an in-memory ledger (dev mode). */
function createLedger(): TokenLedger {
  if (!config.ledgerUrl) {
    console.warn("[distributor] LEDGER_URL not set, dev mode (in-memory ledger, starts empty)");
    return new MockTokenLedger(config.custodyAddress);
  }
  return new LedgerRestClient({
    baseUrl: config.ledgerUrl,
    apiKey: config.ledgerApiKey,
    custody: config.custodyAddress,
    tlsCertPath: config.ledgerTlsCertPath,
    timeoutMs: config.ledgerTimeoutMs,
  });
}

export interface DistributorDeps {
  distributor?: Distributor;
  ledger?: TokenLedger;
  /** Tokens accepted on admin routes. Default: from config. */
  credentials?: AdminCredential[];
  /** Fastify logger on/off. Default: true. */
  logger?: boolean;
}

/** snake_case error code for the wire, e.g. ALREADY_CLAIMED → already_claimed. */
function wireCode(code: string): string {
  return code.toLowerCase();
}

/** Schema validation failure raised by Fastify before the handler runs. */
function isValidationError(err: unknown): err is Error & { validation: unknown } {
  return err instanceof Error && "validation" in err && err.validation !== undefined;
}

export async function buildApp(deps?: DistributorDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: deps?.logger ?? true });

  let distributor = deps?.distributor;
  if (!distributor) {
    distributor = new Distributor({
      ledger: deps?.ledger ?? createLedger(),
      custody: config.custodyAddress,
      owner: config.adminAddress,
      stateFile: config.statePath ? new StateFile(config.statePath) : null,
      logger: app.log,
    });
    await distributor.init();
  }

  app.setErrorHandler((error, request, reply) => {
    if (isDistributorError(error)) {
      return reply.status(HTTP_STATUS[error.code]).send({
        error: wireCode(error.code),
        detail: error.message,
      });
    }
    if (isValidationError(error)) {
      return reply.status(400).send({ error: "invalid_request", detail: error.message });
    }
    request.log.error({ err: error }, "unhandled error");
    return reply.status(500).send({ error: "internal_error" });
  });

  healthRoutes(app, distributor);
  claimRoutes(app, distributor);
  const credentials = deps?.credentials ?? config.adminCredentials;
  seedRoutes(app, distributor, credentials);
  ownerRoutes(app, distributor, credentials);
  queryRoutes(app, distributor);
  eventRoutes(app, distributor);

  return app;
}

// Start server when run directly
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── distributor config ───");
  console.log(`  port:        ${config.port}`);
  console.log(`  custody:     ${config.custodyAddress}`);
  console.log(`  admin:       ${config.adminAddress}`);
  console.log(`  credentials: ${config.adminCredentials.length || "(none: admin routes disabled)"}`);
  console.log(`  ledger_url:  ${config.ledgerUrl || "(none: dev mode)"}`);
  console.log(`  state_path:  ${config.statePath || "(none: memory only)"}`);
  console.log("──────────────────────────");

  const app = await buildApp();
  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
