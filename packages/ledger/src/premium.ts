/**
 * PremiumSubscriptionManager: subscription expirations and the premium pool.
 */

import type { Identity } from "./host.js";
import type { CatalogState, LedgerScope } from "./state.js";
import { receive } from "./treasury.js";

/** Expiration in seconds; 0 if the account never subscribed. */
export function subscriptionExpiration(state: CatalogState, account: Identity): number {
  return state.subscriptions.get(account) ?? 0;
}

/** Only accounts with a purchased subscription can be premium, whatever the clock reads. */
export function isPremium(state: CatalogState, account: Identity, now: number): boolean {
  const expiration = state.subscriptions.get(account);
  return expiration !== undefined && expiration >= now;
}

/**
 * Extend the payer's subscription by one premiumPeriod and pool the fee.
 * An active subscription is extended from its expiration, not from now, so
 * buying early never loses paid-for time.
 *
 * @returns the new expiration
 */
export function buySubscription(scope: LedgerScope, payer: Identity, fee: bigint): number {
  const { state, now } = scope;
  const current = subscriptionExpiration(state, payer);
  const expiration = Math.max(current, now) + state.config.premiumPeriod;

  state.subscriptions.set(payer, expiration);
  state.pool.premiumCredit += fee;
  receive(state, fee);

  scope.emit({ type: "NewPremiumSubscription", account: payer, expiration });
  return expiration;
}
