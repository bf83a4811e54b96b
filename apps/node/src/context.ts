/**
 * Shared state the node's routes and scheduler work against.
 */

import type { Catalog } from "@catalog/ledger";
import type { MemoryHost } from "@catalog/chain";
import type { CallStore } from "./call-store.js";
import type { EventLog } from "./event-log/writer.js";
import type { NodeIdentity } from "./identity.js";

export interface NodeContext {
  catalog: Catalog;
  host: MemoryHost;
  eventLog: EventLog;
  calls: CallStore;
  identity: NodeIdentity;
  /** Accepted distance between a call's ts and Date.now(), ms. */
  maxCallSkewMs: number;
}
