/**
 * GET /events?since=&limit= - committed catalog events from seq `since`.
 */

import type { FastifyInstance } from "fastify";
import { Value } from "@sinclair/typebox/value";
import type { NodeContext } from "../context.js";
import { DEFAULT_EVENTS_LIMIT, EventsQuery, MAX_EVENTS_LIMIT } from "../event-log/schemas.js";

export function eventRoutes(app: FastifyInstance, ctx: NodeContext): void {
  app.get<{ Querystring: unknown }>("/events", async (request, reply) => {
    const query = request.query;
    if (!Value.Check(EventsQuery, query)) {
      return reply
        .status(422)
        .send({ error: "invalid_query", detail: "since and limit must be non-negative integers" });
    }

    const since = query.since === undefined ? 0 : parseInt(query.since, 10);
    const limit = Math.min(
      query.limit === undefined ? DEFAULT_EVENTS_LIMIT : parseInt(query.limit, 10),
      MAX_EVENTS_LIMIT,
    );
    const events = ctx.eventLog.since(since, limit);
    const last = events[events.length - 1];

    return reply.send({ events, next: last ? last.seq + 1 : since });
  });
}
