/**
 * RevenueDistributor: proportional premium split and teardown liquidation.
 *
 * share(author) = floor(premiumCredit × author.premiumViews / totalPremiumViews)
 *
 * Floor division can leave a remainder. It is discarded from the pool and
 * counted in `forfeitedCredit`; the value itself stays in `held` and reaches
 * the owner at teardown.
 *
 * Both passes settle every counter before the first transfer, so a payee
 * that calls back in sees an empty pool.
 */

import { CatalogError } from "./errors.js";
import type { Identity } from "./host.js";
import type { CatalogState, LedgerScope } from "./state.js";
import { payOut } from "./treasury.js";

export interface PremiumShare {
  author: Identity;
  views: number;
  share: bigint;
}

export interface SharePlan {
  shares: PremiumShare[];
  paid: bigint;
  forfeited: bigint;
}

export interface DistributionResult extends SharePlan {
  distributedAt: number;
  credit: bigint;
  views: number;
}

export interface LiquidationPayout {
  author: Identity;
  contentCredit: bigint;
  premiumShare: bigint;
  amount: bigint;
}

export interface LiquidationResult {
  payouts: LiquidationPayout[];
  residual: bigint;
  owner: Identity;
}

/**
 * Split `credit` across `entries` by view weight. Pure.
 * With no views at all, nothing is paid and the whole credit is forfeited.
 */
export function computePremiumShares(
  credit: bigint,
  entries: readonly { author: Identity; views: number }[],
): SharePlan {
  const totalViews = entries.reduce((sum, e) => sum + e.views, 0);
  if (totalViews <= 0 || credit <= 0n) {
    return {
      shares: entries.map((e) => ({ author: e.author, views: e.views, share: 0n })),
      paid: 0n,
      forfeited: credit > 0n ? credit : 0n,
    };
  }

  const total = BigInt(totalViews);
  const shares = entries.map((e) => ({
    author: e.author,
    views: e.views,
    share: (credit * BigInt(e.views)) / total,
  }));
  const paid = shares.reduce((sum, s) => sum + s.share, 0n);
  return { shares, paid, forfeited: credit - paid };
}

/** Registered authors holding premium views, in registration order. */
function premiumEntries(state: CatalogState): { author: Identity; views: number }[] {
  const out: { author: Identity; views: number }[] = [];
  for (const [author, info] of state.authors) {
    if (info.registered && info.premiumViews > 0) {
      out.push({ author, views: info.premiumViews });
    }
  }
  return out;
}

/** The next time distributePremiumCredits is allowed. */
export function nextDistributionTime(state: CatalogState): number {
  return state.pool.lastDistributionTime + state.config.premiumWithdrawalPeriod;
}

export function distributePremiumCredits(scope: LedgerScope): DistributionResult {
  const { state, now } = scope;
  const { pool } = state;

  if (now < nextDistributionTime(state)) {
    throw new CatalogError(
      "TooEarly",
      `next distribution at ${nextDistributionTime(state)}, now ${now}`,
    );
  }
  if (pool.premiumViews === 0) {
    throw new CatalogError("NothingToDistribute", "no premium views since last distribution");
  }

  const credit = pool.premiumCredit;
  const views = pool.premiumViews;
  const plan = computePremiumShares(credit, premiumEntries(state));

  // ── Effects ────────────────────────────────────────────────────
  for (const { author } of plan.shares) {
    const info = state.authors.get(author);
    if (info) info.premiumViews = 0;
  }
  pool.premiumCredit = 0n;
  pool.premiumViews = 0;
  pool.lastDistributionTime = now;
  pool.forfeitedCredit += plan.forfeited;

  // ── Interactions ───────────────────────────────────────────────
  for (const { author, share } of plan.shares) {
    payOut(scope, author, share);
  }

  scope.emit({
    type: "PremiumDistributed",
    credit,
    views,
    paid: plan.paid,
    forfeited: plan.forfeited,
  });
  return { ...plan, distributedAt: now, credit, views };
}

/**
 * Final pass: every author gets outstanding pay-per-view credit plus a share
 * of the current pool (no time gate), then the residual goes to the owner and
 * the catalog is closed for good.
 */
export function liquidate(scope: LedgerScope): LiquidationResult {
  const { state } = scope;
  const plan = computePremiumShares(state.pool.premiumCredit, premiumEntries(state));
  const premiumByAuthor = new Map(plan.shares.map((s) => [s.author, s.share]));

  const payouts: LiquidationPayout[] = [];
  for (const [author, info] of state.authors) {
    if (!info.registered) continue;
    const premiumShare = premiumByAuthor.get(author) ?? 0n;
    const amount = info.contentCredit + premiumShare;
    if (amount > 0n) {
      payouts.push({ author, contentCredit: info.contentCredit, premiumShare, amount });
    }
    info.contentCredit = 0n;
    info.contentViews = 0;
    info.premiumViews = 0;
  }

  const totalPaid = payouts.reduce((sum, p) => sum + p.amount, 0n);
  const residual = state.held - totalPaid;

  state.pool.forfeitedCredit += plan.forfeited;
  state.pool.premiumCredit = 0n;
  state.pool.premiumViews = 0;
  state.pool.lastDistributionTime = scope.now;
  state.closed = true;

  for (const p of payouts) {
    payOut(scope, p.author, p.amount);
  }
  payOut(scope, state.owner, residual);

  scope.emit({ type: "CatalogClosed", owner: state.owner, residual });
  return { payouts, residual, owner: state.owner };
}
