/**
 * Ownership routes.
 *
 *   GET  /owner             current and pending owner (public)
 *   POST /owner/transfer    nominate a new owner (owner token)
 *   POST /owner/accept      take over as the nominee (nominee token)
 *   POST /owner/renounce    leave the distributor without an owner (owner token)
 */

import type { FastifyInstance } from "fastify";
import { TransferOwnershipRequestV1 } from "@rootdrop/primitives";
import type { Distributor } from "../distributor.js";
import { resolveCaller, type AdminCredential } from "./auth.js";

export function ownerRoutes(
  app: FastifyInstance,
  distributor: Distributor,
  credentials: readonly AdminCredential[],
): void {
  async function ownerState() {
    return {
      owner: await distributor.owner(),
      pending_owner: await distributor.pendingOwner(),
    };
  }

  app.get("/owner", async (_request, reply) => {
    return reply.send(await ownerState());
  });

  app.post<{ Body: TransferOwnershipRequestV1 }>(
    "/owner/transfer",
    { schema: { body: TransferOwnershipRequestV1 } },
    async (request, reply) => {
      const caller = resolveCaller(request.headers.authorization, credentials);
      if (caller === null) return reply.status(403).send({ error: "unauthorized" });

      await distributor.transferOwnership(caller, request.body.new_owner);
      return reply.send(await ownerState());
    },
  );

  app.post("/owner/accept", async (request, reply) => {
    const caller = resolveCaller(request.headers.authorization, credentials);
    if (caller === null) return reply.status(403).send({ error: "unauthorized" });

    await distributor.acceptOwnership(caller);
    return reply.send(await ownerState());
  });

  app.post("/owner/renounce", async (request, reply) => {
    const caller = resolveCaller(request.headers.authorization, credentials);
    if (caller === null) return reply.status(403).send({ error: "unauthorized" });

    await distributor.renounceOwnership(caller);
    return reply.send(await ownerState());
  });
}
