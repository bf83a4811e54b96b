/**
 * Shared fixtures for ledger tests: a journaling fake host and stub
 * content managers (succeeding, failing, calling back in).
 */

import {
  Catalog,
  CatalogError,
  fingerprintOf,
  type CatalogConfig,
  type CatalogEvent,
  type ContentManager,
  type ContentManagerInfo,
  type ContentRef,
  type ExecutionHost,
  type Identity,
  type Savepoint,
} from "../src/index.js";

export const OWNER = "0a".repeat(32);
export const ALICE = "a1".repeat(32);
export const BOB = "b2".repeat(32);
export const CAROL = "c3".repeat(32);
export const DAVE = "d4".repeat(32);

export const DAY = 24 * 60 * 60;
export const START = 1_000_000;

export const TEST_CONFIG: CatalogConfig = {
  contentFee: 100n,
  contentPeriod: 3_600,
  premiumFee: 1_000n,
  premiumPeriod: 30 * DAY,
  premiumWithdrawalPeriod: 7 * DAY,
  payableViews: 2,
};

// ── Fake host ──────────────────────────────────────────────────────

export class FakeHost implements ExecutionHost {
  time = START;
  readonly sent: { to: Identity; amount: bigint }[] = [];
  readonly managers = new Map<ContentRef, ContentManager>();
  readonly rejecting = new Set<Identity>();
  readonly hooks = new Map<Identity, (amount: bigint) => void>();

  now(): number {
    return this.time;
  }

  send(to: Identity, amount: bigint): void {
    if (this.rejecting.has(to)) throw new Error(`${to} rejects transfers`);
    this.sent.push({ to, amount });
    this.hooks.get(to)?.(amount);
  }

  savepoint(): Savepoint {
    const mark = this.sent.length;
    return {
      rollback: () => {
        this.sent.splice(mark);
      },
      release: () => {},
    };
  }

  contentManager(ref: ContentRef): ContentManager | undefined {
    return this.managers.get(ref);
  }

  paidTo(account: Identity): bigint {
    return this.sent.filter((s) => s.to === account).reduce((sum, s) => sum + s.amount, 0n);
  }
}

// ── Stub managers ──────────────────────────────────────────────────

export class StubManager implements ContentManager {
  readonly grants: { account: Identity; until: number }[] = [];
  /** When set, grantAccess runs this before recording (reentrancy). */
  onGrant: ((account: Identity, until: number) => void) | null = null;
  rejectGrants = false;

  constructor(private readonly info: ContentManagerInfo) {}

  getInfo(): ContentManagerInfo {
    return { ...this.info };
  }

  grantAccess(account: Identity, until: number): void {
    if (this.rejectGrants) throw new Error("grant rejected");
    this.onGrant?.(account, until);
    this.grants.push({ account, until });
  }
}

export class BrokenInfoManager implements ContentManager {
  getInfo(): ContentManagerInfo {
    throw new Error("manager unavailable");
  }

  grantAccess(): void {
    throw new Error("manager unavailable");
  }
}

/** Answers getInfo with whatever JSON it was given, the way a foreign manager might. */
export class RawInfoManager implements ContentManager {
  constructor(private readonly json: string) {}

  getInfo(): ContentManagerInfo {
    return JSON.parse(this.json);
  }

  grantAccess(): void {}
}

// ── Assertions ─────────────────────────────────────────────────────

/** Run `fn` and return the CatalogError it throws. Anything else fails the test. */
export function catalogErrorOf(fn: () => unknown): CatalogError {
  try {
    fn();
  } catch (err) {
    if (err instanceof CatalogError) return err;
    throw err;
  }
  throw new Error("expected a CatalogError, call succeeded");
}

export const codeOf = (fn: () => unknown): string => catalogErrorOf(fn).code;

// ── Builders ───────────────────────────────────────────────────────

export function fp(seed: string): string {
  return fingerprintOf(new TextEncoder().encode(seed));
}

export function refFor(n: number): ContentRef {
  return n.toString(16).padStart(64, "0");
}

export interface Harness {
  host: FakeHost;
  catalog: Catalog;
  events: CatalogEvent[];
  /** Deploy a stub manager and publish it as `author`. */
  publish(author: Identity, opts?: { genre?: number; title?: string; seed?: string }): ContentRef;
  deploy(info: ContentManagerInfo): { ref: ContentRef; manager: StubManager };
}

export function createHarness(config: Partial<CatalogConfig> = TEST_CONFIG): Harness {
  const host = new FakeHost();
  const catalog = new Catalog({ owner: OWNER, host, config });
  const events: CatalogEvent[] = [];
  catalog.subscribe((e) => events.push(e));
  let deployed = 0;

  const deploy = (info: ContentManagerInfo) => {
    deployed += 1;
    const ref = refFor(deployed);
    const manager = new StubManager(info);
    host.managers.set(ref, manager);
    return { ref, manager };
  };

  return {
    host,
    catalog,
    events,
    deploy,
    publish(author, opts = {}) {
      const n = deployed + 1;
      const { ref } = deploy({
        author,
        title: opts.title ?? `title-${n}`,
        genre: opts.genre ?? 1,
        fingerprint: fp(opts.seed ?? `content-${n}`),
      });
      catalog.publish({ caller: author, value: 0n }, ref);
      return ref;
    },
  };
}
