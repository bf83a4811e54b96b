/**
 * Signed call routes.
 *
 * POST /call          - verify a CallV1 envelope and apply it to the catalog
 * GET  /call/:call_id - outcome of an applied call (while retained)
 */

import type { FastifyInstance } from "fastify";
import { Value } from "@sinclair/typebox/value";
import { CallV1, computeCallId, isCatalogError, verifyCall } from "@catalog/ledger";
import type { NodeContext } from "../context.js";
import { dispatchCall } from "../dispatch.js";
import { sendCatalogError } from "../errors.js";
import { toWire } from "../wire.js";

export function callRoutes(app: FastifyInstance, ctx: NodeContext): void {
  app.post<{ Body: unknown }>("/call", async (request, reply) => {
    const call = request.body;

    // ── Envelope ──────────────────────────────────────────────────
    if (!Value.Check(CallV1, call)) {
      const first = Value.Errors(CallV1, call).First();
      return reply.status(422).send({
        error: "invalid_call",
        detail: first ? `${first.path || "/"}: ${first.message}` : "malformed envelope",
      });
    }
    if (!(await verifyCall(call))) {
      return reply
        .status(401)
        .send({ error: "invalid_signature", detail: "Ed25519 sig verification failed" });
    }

    const callId = computeCallId(call);

    // ── Replay ────────────────────────────────────────────────────
    const applied = ctx.calls.get(callId);
    if (applied) {
      return reply.send({
        call_id: callId,
        result: applied.result,
        events: applied.events,
        replayed: true,
      });
    }
    const skew = Math.abs(Date.now() - call.ts);
    if (skew > ctx.maxCallSkewMs) {
      return reply
        .status(422)
        .send({ error: "stale_call", detail: `ts is ${skew}ms from node clock` });
    }

    // ── Apply ─────────────────────────────────────────────────────
    const fromSeq = ctx.eventLog.nextSeq();
    let result: unknown;
    try {
      result = toWire(dispatchCall(ctx, call));
    } catch (err) {
      if (isCatalogError(err)) {
        request.log.info({ call_id: callId, op: call.op, code: err.code }, "call rejected");
        return sendCatalogError(reply, err);
      }
      throw err;
    }
    const events = ctx.eventLog.since(fromSeq);

    ctx.calls.set({ callId, op: call.op, from: call.from, result, events });
    request.log.info({ call_id: callId, op: call.op, events: events.length }, "call applied");

    return reply.send({ call_id: callId, result, events, replayed: false });
  });

  app.get<{ Params: { call_id: string } }>("/call/:call_id", async (request, reply) => {
    const { call_id } = request.params;
    if (!/^[0-9a-f]{64}$/.test(call_id)) {
      return reply.status(400).send({ error: "invalid_call_id" });
    }
    const applied = ctx.calls.get(call_id);
    if (!applied) {
      return reply.status(404).send({ error: "not_found" });
    }
    return reply.send({
      call_id,
      op: applied.op,
      from: applied.from,
      result: applied.result,
      events: applied.events,
      applied_at: applied.appliedAt,
    });
  });
}
