/**
 * GET /health - liveness plus a one-line view of the catalog.
 */

import type { FastifyInstance } from "fastify";
import type { NodeContext } from "../context.js";

export function healthRoutes(app: FastifyInstance, ctx: NodeContext): void {
  app.get("/health", async (_request, reply) => {
    return reply.send({
      status: "ok",
      timestamp: Date.now(),
      node: ctx.identity.publicKey,
      host_time: ctx.host.now(),
      contents: ctx.catalog.getContentCount(),
      events: ctx.eventLog.nextSeq(),
      closed: ctx.catalog.isClosed(),
    });
  });
}
