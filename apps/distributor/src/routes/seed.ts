/**
 * Seeding route: POST /seed
 *
 * Requires `Authorization: Bearer <token>` for one of the configured admin
 * credentials. The core then checks that the credential's address is the
 * current owner.
 */

import type { FastifyInstance } from "fastify";
import { SeedRequestV1 } from "@rootdrop/primitives";
import type { Distributor } from "../distributor.js";
import { resolveCaller, type AdminCredential } from "./auth.js";
import { toUint } from "./parse.js";

export function seedRoutes(
  app: FastifyInstance,
  distributor: Distributor,
  credentials: readonly AdminCredential[],
): void {
  app.post<{ Body: SeedRequestV1 }>(
    "/seed",
    { schema: { body: SeedRequestV1 } },
    async (request, reply) => {
      const caller = resolveCaller(request.headers.authorization, credentials);
      if (caller === null) {
        return reply.status(403).send({ error: "unauthorized" });
      }

      const body = request.body;
      const result = await distributor.seed(caller, {
        period: toUint("period", body.period),
        root: body.root,
        totalAllocation: toUint("total_allocation", body.total_allocation),
        fundingSource: body.funding_source,
      });

      return reply.status(201).send({
        ok: true,
        period: result.period.toString(),
        root: result.root,
        total_allocation: result.totalAllocation.toString(),
      });
    },
  );
}
