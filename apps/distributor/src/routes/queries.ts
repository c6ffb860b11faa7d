/**
 * Read-only query routes. No auth.
 *
 * GET  /roots/:period           root for one period (zero hash if unset)
 * GET  /roots?from=&to=         roots for an inclusive period range
 * GET  /claimed/:period/:index  claim bit for one (period, index)
 * POST /claimed/status          positional (index, period) pairs
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import {
  ClaimStatusRequestV1,
  DecimalU256,
  RootRangeQueryV1,
} from "@rootdrop/primitives";
import type { Distributor } from "../distributor.js";
import { toUint } from "./parse.js";

const PeriodParams = Type.Object({ period: DecimalU256 });
type PeriodParams = Static<typeof PeriodParams>;

const ClaimedParams = Type.Object({ period: DecimalU256, index: DecimalU256 });
type ClaimedParams = Static<typeof ClaimedParams>;

export function queryRoutes(app: FastifyInstance, distributor: Distributor): void {
  app.get<{ Params: PeriodParams }>(
    "/roots/:period",
    { schema: { params: PeriodParams } },
    async (request, reply) => {
      const period = toUint("period", request.params.period);
      const root = await distributor.rootOf(period);
      return reply.send({ period: period.toString(), root });
    },
  );

  app.get<{ Querystring: RootRangeQueryV1 }>(
    "/roots",
    { schema: { querystring: RootRangeQueryV1 } },
    async (request, reply) => {
      const from = toUint("from", request.query.from);
      const to = toUint("to", request.query.to);
      const roots = await distributor.merkleRoots(from, to);
      return reply.send({ from: from.toString(), to: to.toString(), roots });
    },
  );

  app.get<{ Params: ClaimedParams }>(
    "/claimed/:period/:index",
    { schema: { params: ClaimedParams } },
    async (request, reply) => {
      const period = toUint("period", request.params.period);
      const index = toUint("index", request.params.index);
      const claimed = await distributor.isClaimed(period, index);
      return reply.send({ period: period.toString(), index: index.toString(), claimed });
    },
  );

  app.post<{ Body: ClaimStatusRequestV1 }>(
    "/claimed/status",
    { schema: { body: ClaimStatusRequestV1 } },
    async (request, reply) => {
      const body = request.body;
      const status = await distributor.claimStatus(
        body.indices.map((index, i) => toUint(`indices[${i}]`, index)),
        toUint("period_begin", body.period_begin),
        toUint("period_end", body.period_end),
      );
      return reply.send({ status });
    },
  );
}
