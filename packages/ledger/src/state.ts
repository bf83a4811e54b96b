/**
 * CatalogState: the single aggregate every component operates on.
 *
 * Components receive the state explicitly; nothing is module-global, so a
 * test can build a synthetic ledger and drive one component in isolation.
 */

import type { CatalogConfig } from "./schemas/config.js";
import type { Fingerprint } from "./fingerprint.js";
import type { ContentRef, ExecutionHost, Identity } from "./host.js";
import type { CatalogEvent } from "./events.js";

export interface AuthorInfo {
  /** Unclaimed pay-per-view revenue. */
  contentCredit: bigint;
  /** Pay-per-view grants since the last withdrawal. */
  contentViews: number;
  /** Premium grants since the last distribution. */
  premiumViews: number;
  /** Set on first publish; never cleared. */
  registered: boolean;
}

export interface ContentInfo {
  ref: ContentRef;
  author: Identity;
  title: string;
  genre: number;
  fingerprint: Fingerprint;
  publishedAt: number;
  /** Pay-per-view plus premium grants. Only ever increases. */
  views: number;
}

export interface PoolState {
  premiumCredit: bigint;
  /** Always equals the sum of every author's premiumViews between calls. */
  premiumViews: number;
  lastDistributionTime: number;
  /** Floor-division remainders discarded from past distributions. */
  forfeitedCredit: bigint;
}

export interface CatalogState {
  readonly owner: Identity;
  config: CatalogConfig;
  /** Publish order. */
  contents: ContentInfo[];
  contentIndex: Map<ContentRef, number>;
  fingerprints: Set<Fingerprint>;
  /** Registration order (Map preserves insertion order). */
  authors: Map<Identity, AuthorInfo>;
  /** account → subscription expiration (seconds). */
  subscriptions: Map<Identity, number>;
  pool: PoolState;
  /** Value the Catalog holds: fees received minus transfers out. */
  held: bigint;
  closed: boolean;
}

export function createCatalogState(
  owner: Identity,
  config: CatalogConfig,
  now: number,
): CatalogState {
  return {
    owner,
    config: { ...config },
    contents: [],
    contentIndex: new Map(),
    fingerprints: new Set(),
    authors: new Map(),
    subscriptions: new Map(),
    pool: {
      premiumCredit: 0n,
      premiumViews: 0,
      lastDistributionTime: now,
      forfeitedCredit: 0n,
    },
    held: 0n,
    closed: false,
  };
}

export function cloneState(state: CatalogState): CatalogState {
  return structuredClone(state);
}

/**
 * Put `snapshot` back into `target` in place. Callers holding `target`
 * (including outer frames of a reentrant call) keep a valid reference.
 */
export function restoreState(target: CatalogState, snapshot: CatalogState): void {
  target.config = snapshot.config;
  target.contents = snapshot.contents;
  target.contentIndex = snapshot.contentIndex;
  target.fingerprints = snapshot.fingerprints;
  target.authors = snapshot.authors;
  target.subscriptions = snapshot.subscriptions;
  target.pool = snapshot.pool;
  target.held = snapshot.held;
  target.closed = snapshot.closed;
}

/** Context handed to every component operation. */
export interface LedgerScope {
  state: CatalogState;
  /** Call timestamp, fixed for the whole call. */
  now: number;
  host: ExecutionHost;
  emit(event: CatalogEvent): void;
}
