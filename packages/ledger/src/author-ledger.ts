/**
 * AuthorLedger: pay-per-view accrual, premium counters, withdrawal gate.
 */

import { CatalogError } from "./errors.js";
import type { Identity } from "./host.js";
import type { AuthorInfo, CatalogState, LedgerScope } from "./state.js";
import { payOut } from "./treasury.js";

function blankAuthor(): AuthorInfo {
  return { contentCredit: 0n, contentViews: 0, premiumViews: 0, registered: false };
}

/**
 * Register `author` if new. Returns true when this call registered it.
 */
export function registerAuthor(state: CatalogState, author: Identity): boolean {
  const existing = state.authors.get(author);
  if (existing?.registered) return false;
  state.authors.set(author, { ...(existing ?? blankAuthor()), registered: true });
  return true;
}

/** Copy of the author's record; a zeroed, unregistered record if unknown. */
export function getAuthorInfo(state: CatalogState, author: Identity): AuthorInfo {
  const info = state.authors.get(author);
  return info ? { ...info } : blankAuthor();
}

/** Registered authors in registration order. */
export function getAuthors(state: CatalogState): Identity[] {
  const out: Identity[] = [];
  for (const [author, info] of state.authors) {
    if (info.registered) out.push(author);
  }
  return out;
}

function requireAuthor(state: CatalogState, author: Identity): AuthorInfo {
  const info = state.authors.get(author);
  if (!info?.registered) {
    throw new CatalogError("Unregistered", `${author} has not published`);
  }
  return info;
}

export function recordPayPerView(scope: LedgerScope, author: Identity, fee: bigint): void {
  const info = requireAuthor(scope.state, author);
  info.contentViews += 1;
  info.contentCredit += fee;
  if (info.contentViews >= scope.state.config.payableViews) {
    scope.emit({ type: "CreditAvailable", author });
  }
}

export function recordPremiumView(state: CatalogState, author: Identity): void {
  const info = requireAuthor(state, author);
  info.premiumViews += 1;
  state.pool.premiumViews += 1;
}

/**
 * Pay out the caller's whole pay-per-view credit.
 *
 * Credit and view count are zeroed before the transfer: a reentrant withdraw
 * from inside it finds zero views and fails the threshold check.
 */
export function withdraw(scope: LedgerScope, caller: Identity): bigint {
  const { state } = scope;
  const info = requireAuthor(state, caller);
  if (info.contentViews < state.config.payableViews) {
    throw new CatalogError(
      "ThresholdNotReached",
      `${info.contentViews} of ${state.config.payableViews} payable views`,
    );
  }

  const amount = info.contentCredit;
  info.contentCredit = 0n;
  info.contentViews = 0;

  payOut(scope, caller, amount);
  return amount;
}
