/**
 * Claim routes.
 *
 * POST /claim        single claim, paid immediately
 * POST /claim/batch  several claims for one account, one payout
 */

import type { FastifyInstance } from "fastify";
import { BatchClaimRequestV1, ClaimRequestV1 } from "@rootdrop/primitives";
import type { Distributor } from "../distributor.js";
import { toUint } from "./parse.js";

export function claimRoutes(app: FastifyInstance, distributor: Distributor): void {
  app.post<{ Body: ClaimRequestV1 }>(
    "/claim",
    { schema: { body: ClaimRequestV1 } },
    async (request, reply) => {
      const body = request.body;
      const receipt = await distributor.claim({
        index: toUint("index", body.index),
        account: body.account,
        period: toUint("period", body.period),
        amount: toUint("amount", body.amount),
        proof: body.proof,
      });

      return reply.send({
        ok: true,
        period: receipt.period.toString(),
        index: receipt.index.toString(),
        account: receipt.account,
        amount: receipt.amount.toString(),
      });
    },
  );

  app.post<{ Body: BatchClaimRequestV1 }>(
    "/claim/batch",
    { schema: { body: BatchClaimRequestV1 } },
    async (request, reply) => {
      const { account, entries } = request.body;
      const result = await distributor.claimBatch(
        account,
        entries.map((entry, i) => ({
          index: toUint(`entries[${i}].index`, entry.index),
          period: toUint(`entries[${i}].period`, entry.period),
          amount: toUint(`entries[${i}].amount`, entry.amount),
          proof: entry.proof,
        })),
      );

      return reply.send({
        ok: true,
        account: result.account,
        total: result.total.toString(),
        claimed: result.claims.map((c) => ({
          period: c.period.toString(),
          index: c.index.toString(),
          amount: c.amount.toString(),
        })),
      });
    },
  );
}
