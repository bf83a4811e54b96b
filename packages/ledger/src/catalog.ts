/**
 * Catalog: the public surface of the ledger.
 *
 * Every mutating operation runs as one transaction:
 *   1. snapshot the state and open a host savepoint
 *   2. guards → effects → interactions
 *   3. on throw: restore the snapshot in place, roll the savepoint back,
 *      drop the frame's events, rethrow
 *   4. on success: release the savepoint and hand events to the parent
 *      frame, or to subscribers when this was the outermost call
 *
 * Frames nest, so a collaborator that calls back in gets its own
 * all-or-nothing frame.
 */

import { Value } from "@sinclair/typebox/value";
import {
  DEFAULT_CONTENT_FEE,
  DEFAULT_CONTENT_PERIOD,
  DEFAULT_PAYABLE_VIEWS,
  DEFAULT_PREMIUM_FEE,
  DEFAULT_PREMIUM_PERIOD,
  DEFAULT_PREMIUM_WITHDRAWAL_PERIOD,
} from "./constants.js";
import { CatalogError } from "./errors.js";
import type { CatalogEvent, CatalogEventListener } from "./events.js";
import type { CallContext, ContentRef, ExecutionHost, Identity } from "./host.js";
import { CatalogConfig, type ConfigKey } from "./schemas/config.js";
import {
  cloneState,
  createCatalogState,
  restoreState,
  type AuthorInfo,
  type CatalogState,
  type ContentInfo,
  type LedgerScope,
  type PoolState,
} from "./state.js";
import { exactValue, noValue, onlyOwner, whileOpen } from "./guards.js";
import * as registry from "./content-registry.js";
import * as authors from "./author-ledger.js";
import * as premium from "./premium.js";
import * as bridge from "./access-bridge.js";
import * as revenue from "./revenue.js";

export interface CatalogOptions {
  owner: Identity;
  host: ExecutionHost;
  config?: Partial<CatalogConfig>;
  /** Called when a subscriber throws. Default: console.error. */
  onListenerError?: (error: unknown, event: CatalogEvent) => void;
}

export interface PoolSnapshot extends PoolState {
  nextDistributionTime: number;
  held: bigint;
}

export function resolveConfig(overrides: Partial<CatalogConfig> = {}): CatalogConfig {
  const config: CatalogConfig = {
    contentFee: overrides.contentFee ?? DEFAULT_CONTENT_FEE,
    contentPeriod: overrides.contentPeriod ?? DEFAULT_CONTENT_PERIOD,
    premiumFee: overrides.premiumFee ?? DEFAULT_PREMIUM_FEE,
    premiumPeriod: overrides.premiumPeriod ?? DEFAULT_PREMIUM_PERIOD,
    premiumWithdrawalPeriod: overrides.premiumWithdrawalPeriod ?? DEFAULT_PREMIUM_WITHDRAWAL_PERIOD,
    payableViews: overrides.payableViews ?? DEFAULT_PAYABLE_VIEWS,
  };
  if (!Value.Check(CatalogConfig, config)) {
    const first = Value.Errors(CatalogConfig, config).First();
    throw new CatalogError(
      "InvalidArgument",
      `invalid catalog config${first ? ` at ${first.path}: ${first.message}` : ""}`,
    );
  }
  return config;
}

export class Catalog {
  private readonly state: CatalogState;
  private readonly host: ExecutionHost;
  private readonly listeners = new Set<CatalogEventListener>();
  private readonly frames: CatalogEvent[][] = [];
  private readonly onListenerError: (error: unknown, event: CatalogEvent) => void;

  constructor(options: CatalogOptions) {
    this.host = options.host;
    this.state = createCatalogState(options.owner, resolveConfig(options.config), this.host.now());
    this.onListenerError =
      options.onListenerError ??
      ((err, event) => console.error(`[catalog] listener failed on ${event.type}:`, err));
  }

  get owner(): Identity {
    return this.state.owner;
  }

  /** Receive committed events in order. Returns an unsubscribe function. */
  subscribe(listener: CatalogEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ── ContentRegistry ──────────────────────────────────────────────

  publish(ctx: CallContext, ref: ContentRef): ContentInfo {
    return this.transact((scope) => {
      whileOpen(scope.state);
      noValue(ctx);
      return registry.publish(scope, ctx.caller, ref);
    });
  }

  // ── PremiumSubscriptionManager ───────────────────────────────────

  /** @returns the new expiration */
  buySubscription(ctx: CallContext): number {
    return this.transact((scope) => {
      whileOpen(scope.state);
      exactValue(ctx, scope.state.config.premiumFee, "premium subscription");
      return premium.buySubscription(scope, ctx.caller, ctx.value);
    });
  }

  // ── AccessGrantBridge ────────────────────────────────────────────

  /** Pay-per-view access. @returns grant expiration */
  getContent(ctx: CallContext, ref: ContentRef): number {
    return this.transact((scope) => {
      whileOpen(scope.state);
      exactValue(ctx, scope.state.config.contentFee, "content access");
      return bridge.grantPayPerView(scope, ctx.caller, ref, ctx.value);
    });
  }

  /** Access under the caller's subscription. @returns grant expiration */
  getContentPremium(ctx: CallContext, ref: ContentRef): number {
    return this.transact((scope) => {
      whileOpen(scope.state);
      noValue(ctx);
      return bridge.grantPremium(scope, ctx.caller, ref);
    });
  }

  // ── AuthorLedger ─────────────────────────────────────────────────

  /** @returns the amount transferred */
  withdraw(ctx: CallContext): bigint {
    return this.transact((scope) => {
      whileOpen(scope.state);
      noValue(ctx);
      return authors.withdraw(scope, ctx.caller);
    });
  }

  // ── RevenueDistributor ───────────────────────────────────────────

  /** Permissionless; throttled by premiumWithdrawalPeriod. */
  distributePremiumCredits(ctx: CallContext): revenue.DistributionResult {
    return this.transact((scope) => {
      whileOpen(scope.state);
      noValue(ctx);
      return revenue.distributePremiumCredits(scope);
    });
  }

  closeCatalog(ctx: CallContext): revenue.LiquidationResult {
    return this.transact((scope) => {
      whileOpen(scope.state);
      onlyOwner(scope.state, ctx);
      noValue(ctx);
      return revenue.liquidate(scope);
    });
  }

  // ── Configuration (owner only) ───────────────────────────────────

  setContentFee(ctx: CallContext, fee: bigint): void {
    this.setConfig(ctx, "contentFee", fee);
  }

  setContentPeriod(ctx: CallContext, seconds: number): void {
    this.setConfig(ctx, "contentPeriod", seconds);
  }

  setPremiumFee(ctx: CallContext, fee: bigint): void {
    this.setConfig(ctx, "premiumFee", fee);
  }

  setPremiumPeriod(ctx: CallContext, seconds: number): void {
    this.setConfig(ctx, "premiumPeriod", seconds);
  }

  setPremiumWithdrawalPeriod(ctx: CallContext, seconds: number): void {
    this.setConfig(ctx, "premiumWithdrawalPeriod", seconds);
  }

  setPayableViews(ctx: CallContext, views: number): void {
    this.setConfig(ctx, "payableViews", views);
  }

  private setConfig<K extends ConfigKey>(ctx: CallContext, key: K, value: CatalogConfig[K]): void {
    this.transact((scope) => {
      whileOpen(scope.state);
      onlyOwner(scope.state, ctx);
      noValue(ctx);
      if (!Value.Check(CatalogConfig.properties[key], value)) {
        throw new CatalogError("InvalidArgument", `${key} must be a non-negative integer`);
      }
      scope.state.config[key] = value;
      scope.emit({ type: "ConfigChanged", key, value: String(value) });
    });
  }

  // ── Queries ──────────────────────────────────────────────────────

  getConfig(): CatalogConfig {
    return { ...this.state.config };
  }

  getContentList(): ContentRef[] {
    return registry.getContentList(this.state);
  }

  getStatistics(): { refs: ContentRef[]; views: number[] } {
    return registry.getStatistics(this.state);
  }

  getNewContentList(n: number): ContentRef[] {
    return registry.getNewContentList(this.state, n);
  }

  getLatestByGenre(genre: number): ContentRef | null {
    return registry.getLatestByGenre(this.state, genre);
  }

  getLatestByAuthor(author: Identity): ContentRef | null {
    return registry.getLatestByAuthor(this.state, author);
  }

  getMostPopularByGenre(genre: number): ContentRef | null {
    return registry.getMostPopularByGenre(this.state, genre);
  }

  getMostPopularByAuthor(author: Identity): ContentRef | null {
    return registry.getMostPopularByAuthor(this.state, author);
  }

  getContentInfo(ref: ContentRef): ContentInfo {
    return registry.getContentInfo(this.state, ref);
  }

  getContentCount(): number {
    return this.state.contents.length;
  }

  getAuthorInfo(author: Identity): AuthorInfo {
    return authors.getAuthorInfo(this.state, author);
  }

  getAuthors(): Identity[] {
    return authors.getAuthors(this.state);
  }

  isPremium(account: Identity): boolean {
    return premium.isPremium(this.state, account, this.host.now());
  }

  getSubscriptionExpiration(account: Identity): number {
    return premium.subscriptionExpiration(this.state, account);
  }

  getPool(): PoolSnapshot {
    return {
      ...this.state.pool,
      nextDistributionTime: revenue.nextDistributionTime(this.state),
      held: this.state.held,
    };
  }

  isClosed(): boolean {
    return this.state.closed;
  }

  // ── Transactions ─────────────────────────────────────────────────

  /**
   * Run `fn` as one all-or-nothing frame. The snapshot copies the whole
   * aggregate, so every mutation costs O(catalog size) on entry.
   */
  private transact<T>(fn: (scope: LedgerScope) => T): T {
    const snapshot = cloneState(this.state);
    const savepoint = this.host.savepoint();
    const events: CatalogEvent[] = [];
    const scope: LedgerScope = {
      state: this.state,
      now: this.host.now(),
      host: this.host,
      emit: (event) => {
        events.push(event);
      },
    };

    this.frames.push(events);
    let result: T;
    try {
      result = fn(scope);
    } catch (err) {
      this.frames.pop();
      restoreState(this.state, snapshot);
      savepoint.rollback();
      throw err;
    }
    this.frames.pop();
    savepoint.release();

    const parent = this.frames[this.frames.length - 1];
    if (parent) {
      parent.push(...events);
    } else {
      this.deliver(events);
    }
    return result;
  }

  private deliver(events: readonly CatalogEvent[]): void {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          this.onListenerError(err, event);
        }
      }
    }
  }
}
