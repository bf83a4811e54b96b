/**
 * Event log schemas: the node's append-only record of committed
 * Catalog events.
 *
 * Anyone reading the log from seq 0 sees every state change in order.
 */

import { Type, type Static } from "@sinclair/typebox";

export const EventEnvelope = Type.Object({
  /** Monotonic sequence number within the log, from 0. */
  seq: Type.Integer({ minimum: 0 }),
  /** Catalog event type (NewAuthor, ContentGranted, ...). */
  type: Type.String(),
  /** Host time at commit, seconds. */
  timestamp: Type.Integer({ minimum: 0 }),
  /** Event fields in wire form (amounts as decimal strings). */
  payload: Type.Record(Type.String(), Type.Unknown()),
});

export type EventEnvelope = Static<typeof EventEnvelope>;

export const EventsQuery = Type.Object({
  since: Type.Optional(Type.String({ pattern: "^[0-9]+$" })),
  limit: Type.Optional(Type.String({ pattern: "^[0-9]+$" })),
});

export type EventsQuery = Static<typeof EventsQuery>;

export const DEFAULT_EVENTS_LIMIT = 100;
export const MAX_EVENTS_LIMIT = 1_000;
