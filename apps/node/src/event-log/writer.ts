/**
 * Event log writer: in-memory append-only store.
 *
 * Subscribed to the Catalog, so it only ever sees committed events.
 */

import type { CatalogEvent } from "@catalog/ledger";
import { wireRecord } from "../wire.js";
import type { EventEnvelope } from "./schemas.js";

export class EventLog {
  private readonly entries: EventEnvelope[] = [];

  append(event: CatalogEvent, timestamp: number): EventEnvelope {
    const { type, ...fields } = event;
    const envelope: EventEnvelope = {
      seq: this.entries.length,
      type,
      timestamp,
      payload: wireRecord(fields),
    };
    this.entries.push(envelope);
    return envelope;
  }

  /** Entries with seq >= `fromSeq`, oldest first. */
  since(fromSeq: number, limit: number = Infinity): EventEnvelope[] {
    return this.entries.slice(fromSeq, fromSeq + limit);
  }

  /** The seq the next appended event will get. */
  nextSeq(): number {
    return this.entries.length;
  }
}
