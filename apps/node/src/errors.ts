/**
 * CatalogError → HTTP reply mapping. Routes reply `{ error, detail }`.
 */

import type { FastifyError, FastifyReply, FastifyRequest } from "fastify";
import { isCatalogError, type CatalogError, type CatalogErrorCode } from "@catalog/ledger";

const HTTP_ERRORS: Record<CatalogErrorCode, { status: number; error: string }> = {
  PermissionDenied: { status: 403, error: "permission_denied" },
  WrongValue: { status: 422, error: "wrong_value" },
  DuplicateContent: { status: 409, error: "duplicate_content" },
  ContentNotFound: { status: 404, error: "content_not_found" },
  Unregistered: { status: 403, error: "unregistered" },
  ThresholdNotReached: { status: 409, error: "threshold_not_reached" },
  SubscriptionExpired: { status: 402, error: "subscription_expired" },
  TooEarly: { status: 409, error: "too_early" },
  NothingToDistribute: { status: 409, error: "nothing_to_distribute" },
  ExternalCallFailed: { status: 502, error: "external_call_failed" },
  CatalogClosed: { status: 410, error: "catalog_closed" },
  InvalidArgument: { status: 422, error: "invalid_argument" },
};

export function sendCatalogError(reply: FastifyReply, err: CatalogError): FastifyReply {
  const { status, error } = HTTP_ERRORS[err.code];
  return reply.status(status).send({ error, detail: err.message });
}

/** Fastify error handler: CatalogErrors by code, the rest by statusCode. */
export function catalogErrorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
): FastifyReply {
  if (isCatalogError(error)) return sendCatalogError(reply, error);

  const status = error.statusCode ?? 500;
  if (status >= 500) {
    request.log.error({ err: error }, "request failed");
    return reply.status(status).send({ error: "internal_error", detail: error.message });
  }
  return reply.status(status).send({ error: "bad_request", detail: error.message });
}
