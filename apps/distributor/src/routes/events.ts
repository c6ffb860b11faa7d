/**
 * Event feed: GET /events?since=&limit=
 *
 * Returns committed notifications with seq > since, oldest first.
 * Indexers resume from `next_since`.
 */

import type { FastifyInstance } from "fastify";
import { Type, type Static } from "@sinclair/typebox";
import { EVENT_PAGE_DEFAULT, EVENT_PAGE_MAX } from "@rootdrop/primitives";
import type { Distributor } from "../distributor.js";

const EventsQuery = Type.Object({
  since: Type.Optional(Type.Integer({ minimum: 0 })),
  limit: Type.Optional(Type.Integer({ minimum: 1, maximum: EVENT_PAGE_MAX })),
});
type EventsQuery = Static<typeof EventsQuery>;

export function eventRoutes(app: FastifyInstance, distributor: Distributor): void {
  app.get<{ Querystring: EventsQuery }>(
    "/events",
    { schema: { querystring: EventsQuery } },
    async (request, reply) => {
      const since = request.query.since ?? 0;
      const limit = request.query.limit ?? EVENT_PAGE_DEFAULT;
      const events = await distributor.events(since, limit);
      const last = events[events.length - 1];
      return reply.send({ events, next_since: last ? last.seq : since });
    },
  );
}
