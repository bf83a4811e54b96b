/**
 * Execution host interface: what a Catalog needs from its environment.
 *
 * The host supplies the clock, the value-transfer primitive, savepoints for
 * all-or-nothing calls, and lookup of content-manager collaborators.
 * @catalog/chain ships an in-memory implementation; a chain adapter would
 * implement the same interface.
 */

/** Opaque account identity (an Ed25519 public key, hex, on the node). */
export type Identity = string;

/** Address of a content-manager collaborator; doubles as the content id. */
export type ContentRef = string;

export interface ContentManagerInfo {
  author: Identity;
  title: string;
  genre: number;
  /** SHA256 of the content bytes, hex. */
  fingerprint: string;
}

/** Capability surface the Catalog consumes from a content manager. */
export interface ContentManager {
  getInfo(): ContentManagerInfo;
  /** Grant `account` access until `until` (seconds). Throws on rejection. */
  grantAccess(account: Identity, until: number): void;
}

export interface Savepoint {
  /** Undo every host-side effect since the savepoint was opened. */
  rollback(): void;
  release(): void;
}

export interface ExecutionHost {
  /** Current time, integer seconds. */
  now(): number;
  /** Transfer `amount` out of the Catalog to `to`. Throws on failure. */
  send(to: Identity, amount: bigint): void;
  savepoint(): Savepoint;
  contentManager(ref: ContentRef): ContentManager | undefined;
}

/** Who is calling and how much value the call carries. */
export interface CallContext {
  caller: Identity;
  value: bigint;
}

export function callFrom(caller: Identity, value: bigint = 0n): CallContext {
  return { caller, value };
}
