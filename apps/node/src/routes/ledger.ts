/**
 * Ledger state routes (read-only).
 *
 * GET /authors            - registered authors
 * GET /authors/:id        - author credit and view counters
 * GET /premium/:account   - subscription expiration and status
 * GET /pool               - premium pool, distribution window, held value
 * GET /config             - owner, economic parameters, closed flag
 */

import type { FastifyInstance } from "fastify";
import type { NodeContext } from "../context.js";
import { toWire, wireRecord } from "../wire.js";

const HEX32 = /^[0-9a-f]{64}$/;

export function ledgerRoutes(app: FastifyInstance, ctx: NodeContext): void {
  const { catalog } = ctx;

  app.get("/authors", async (_request, reply) => {
    return reply.send({ authors: catalog.getAuthors() });
  });

  app.get<{ Params: { id: string } }>("/authors/:id", async (request, reply) => {
    const { id } = request.params;
    if (!HEX32.test(id)) {
      return reply.status(400).send({ error: "invalid_author" });
    }
    return reply.send({ author: id, ...wireRecord(catalog.getAuthorInfo(id)) });
  });

  app.get<{ Params: { account: string } }>("/premium/:account", async (request, reply) => {
    const { account } = request.params;
    if (!HEX32.test(account)) {
      return reply.status(400).send({ error: "invalid_account" });
    }
    return reply.send({
      account,
      expiration: catalog.getSubscriptionExpiration(account),
      active: catalog.isPremium(account),
    });
  });

  app.get("/pool", async (_request, reply) => {
    return reply.send(toWire(catalog.getPool()));
  });

  app.get("/config", async (_request, reply) => {
    return reply.send({
      owner: catalog.owner,
      closed: catalog.isClosed(),
      ...wireRecord(catalog.getConfig()),
    });
  });
}
