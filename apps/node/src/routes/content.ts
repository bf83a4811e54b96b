/**
 * Content discovery routes (read-only).
 *
 * GET /content                        - every published ref, publish order
 * GET /content/statistics             - refs with their view counts
 * GET /content/new?n=                 - n newest refs, newest first
 * GET /content/latest?genre=|author=  - newest ref in a genre / by an author
 * GET /content/popular?genre=|author= - most viewed ref in a genre / by an author
 * GET /content/:ref                   - one content record
 */

import type { FastifyInstance, FastifyReply } from "fastify";
import type { ContentRef } from "@catalog/ledger";
import type { NodeContext } from "../context.js";
import { toWire } from "../wire.js";

const HEX32 = /^[0-9a-f]{64}$/;
const DEFAULT_NEW_COUNT = 10;

interface FilterQuery {
  genre?: string;
  author?: string;
}

type Filter = { genre: number } | { author: string };

/** Exactly one of genre / author; null after replying 422. */
function parseFilter(query: FilterQuery, reply: FastifyReply): Filter | null {
  const { genre, author } = query;
  if ((genre === undefined) === (author === undefined)) {
    reply.status(422).send({ error: "invalid_query", detail: "pass exactly one of genre, author" });
    return null;
  }
  if (author !== undefined) {
    if (!HEX32.test(author)) {
      reply.status(422).send({ error: "invalid_author", detail: "must be 64 hex chars" });
      return null;
    }
    return { author };
  }
  if (genre === undefined || !/^[0-9]+$/.test(genre)) {
    reply.status(422).send({ error: "invalid_genre", detail: "must be a non-negative integer" });
    return null;
  }
  return { genre: parseInt(genre, 10) };
}

export function contentRoutes(app: FastifyInstance, ctx: NodeContext): void {
  const { catalog } = ctx;

  app.get("/content", async (_request, reply) => {
    return reply.send({ refs: catalog.getContentList() });
  });

  app.get("/content/statistics", async (_request, reply) => {
    return reply.send(catalog.getStatistics());
  });

  app.get<{ Querystring: { n?: string } }>("/content/new", async (request, reply) => {
    const raw = request.query.n;
    if (raw !== undefined && !/^[0-9]+$/.test(raw)) {
      return reply.status(422).send({ error: "invalid_n", detail: "must be a non-negative integer" });
    }
    const n = raw === undefined ? DEFAULT_NEW_COUNT : parseInt(raw, 10);
    return reply.send({ refs: catalog.getNewContentList(n) });
  });

  app.get<{ Querystring: FilterQuery }>("/content/latest", async (request, reply) => {
    const filter = parseFilter(request.query, reply);
    if (!filter) return reply;
    const ref: ContentRef | null =
      "genre" in filter
        ? catalog.getLatestByGenre(filter.genre)
        : catalog.getLatestByAuthor(filter.author);
    return reply.send({ ref });
  });

  app.get<{ Querystring: FilterQuery }>("/content/popular", async (request, reply) => {
    const filter = parseFilter(request.query, reply);
    if (!filter) return reply;
    const ref: ContentRef | null =
      "genre" in filter
        ? catalog.getMostPopularByGenre(filter.genre)
        : catalog.getMostPopularByAuthor(filter.author);
    return reply.send({ ref });
  });

  app.get<{ Params: { ref: string } }>("/content/:ref", async (request, reply) => {
    const { ref } = request.params;
    if (!HEX32.test(ref)) {
      return reply.status(400).send({ error: "invalid_ref" });
    }
    // ContentNotFound reaches the error handler as a 404.
    return reply.send(toWire(catalog.getContentInfo(ref)));
  });
}
