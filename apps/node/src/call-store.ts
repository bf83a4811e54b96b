/**
 * Applied-call store with TTL, keyed by call_id.
 *
 * A signed call is accepted only while its ts is within maxCallSkewMs of the
 * node clock, so holding records for twice that window is enough to answer
 * every replay of an applied call with its original outcome.
 *
 * In-memory: a node restart forgets applied calls (the catalog itself is
 * in-memory too).
 */

import type { CallOp, Identity } from "@catalog/ledger";
import type { EventEnvelope } from "./event-log/schemas.js";

export interface AppliedCall {
  callId: string;
  op: CallOp;
  from: Identity;
  /** Operation result, wire form. */
  result: unknown;
  events: EventEnvelope[];
  appliedAt: number;
  expiresAt: number;
}

const DEFAULT_TTL_MS = 10 * 60 * 1000;

export class CallStore {
  private readonly byId = new Map<string, AppliedCall>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(ttlMs: number = DEFAULT_TTL_MS, now: () => number = Date.now) {
    this.ttlMs = ttlMs;
    this.now = now;
  }

  set(record: Omit<AppliedCall, "appliedAt" | "expiresAt">): AppliedCall {
    const now = this.now();
    const stored: AppliedCall = { ...record, appliedAt: now, expiresAt: now + this.ttlMs };
    this.byId.set(record.callId, stored);
    return stored;
  }

  get(callId: string): AppliedCall | undefined {
    const record = this.byId.get(callId);
    if (!record) return undefined;
    if (this.now() > record.expiresAt) {
      this.byId.delete(callId);
      return undefined;
    }
    return record;
  }

  /** Drop expired records. Returns how many were removed. */
  cleanup(): number {
    const now = this.now();
    let removed = 0;
    for (const [id, record] of this.byId) {
      if (now > record.expiresAt) {
        this.byId.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.byId.size;
  }
}
