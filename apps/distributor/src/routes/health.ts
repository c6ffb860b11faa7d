/**
 * Health route: GET /health
 */

import type { FastifyInstance } from "fastify";
import type { Distributor } from "../distributor.js";

export function healthRoutes(app: FastifyInstance, distributor: Distributor): void {
  app.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      owner: await distributor.owner(),
      events: await distributor.eventCount(),
      timestamp: Date.now(),
    });
  });
}
