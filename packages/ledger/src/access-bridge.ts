/**
 * AccessGrantBridge: the narrow channel to content-manager collaborators.
 *
 * Grants follow checks-effects-interactions: view counts and credit are at
 * their final values before `grantAccess` runs, so a manager that calls back
 * into the Catalog observes the post-grant state. A rejected grant unwinds
 * through the caller's transaction.
 */

import { CatalogError, externalFailure } from "./errors.js";
import { isHex32 } from "./fingerprint.js";
import type {
  ContentManager,
  ContentManagerInfo,
  ContentRef,
  ExecutionHost,
  Identity,
} from "./host.js";
import type { CatalogState, ContentInfo, LedgerScope } from "./state.js";
import { recordPayPerView, recordPremiumView } from "./author-ledger.js";
import { isPremium, subscriptionExpiration } from "./premium.js";
import { receive } from "./treasury.js";

export function resolveManager(host: ExecutionHost, ref: ContentRef): ContentManager {
  const manager = host.contentManager(ref);
  if (!manager) {
    throw new CatalogError("ExternalCallFailed", `no content manager at ${ref}`);
  }
  return manager;
}

/** Call getInfo() on the manager at `ref` and sanity-check the answer. */
export function fetchManagerInfo(host: ExecutionHost, ref: ContentRef): ContentManagerInfo {
  const manager = resolveManager(host, ref);
  let info: ContentManagerInfo;
  try {
    info = manager.getInfo();
  } catch (err) {
    throw externalFailure(err, `getInfo at ${ref}`);
  }

  if (typeof info.author !== "string" || typeof info.title !== "string") {
    throw new CatalogError("ExternalCallFailed", `malformed author or title from ${ref}`);
  }
  if (!isHex32(info.fingerprint)) {
    throw new CatalogError("ExternalCallFailed", `malformed fingerprint from ${ref}`);
  }
  if (!Number.isSafeInteger(info.genre) || info.genre < 0) {
    throw new CatalogError("ExternalCallFailed", `malformed genre from ${ref}`);
  }
  return { ...info };
}

export function requireContent(state: CatalogState, ref: ContentRef): ContentInfo {
  const index = state.contentIndex.get(ref);
  const content = index === undefined ? undefined : state.contents[index];
  if (!content) {
    throw new CatalogError("ContentNotFound", `no content published at ${ref}`);
  }
  return content;
}

function forwardGrant(host: ExecutionHost, ref: ContentRef, account: Identity, until: number): void {
  const manager = resolveManager(host, ref);
  try {
    manager.grantAccess(account, until);
  } catch (err) {
    throw externalFailure(err, `grantAccess at ${ref}`);
  }
}

/**
 * Pay-per-view grant. The fee has already been checked against contentFee.
 * @returns grant expiration
 */
export function grantPayPerView(
  scope: LedgerScope,
  consumer: Identity,
  ref: ContentRef,
  fee: bigint,
): number {
  const { state, host, now } = scope;
  const content = requireContent(state, ref);
  const until = now + state.config.contentPeriod;

  receive(state, fee);
  content.views += 1;
  recordPayPerView(scope, content.author, fee);

  forwardGrant(host, ref, consumer, until);
  scope.emit({ type: "ContentGranted", ref, account: consumer, until, premium: false });
  return until;
}

/**
 * Premium grant, valid until the consumer's subscription runs out.
 * No fee: the subscription already paid into the pool.
 */
export function grantPremium(scope: LedgerScope, consumer: Identity, ref: ContentRef): number {
  const { state, host, now } = scope;
  const content = requireContent(state, ref);
  if (!isPremium(state, consumer, now)) {
    throw new CatalogError("SubscriptionExpired", `${consumer} has no active subscription`);
  }
  const until = subscriptionExpiration(state, consumer);

  content.views += 1;
  recordPremiumView(state, content.author);

  forwardGrant(host, ref, consumer, until);
  scope.emit({ type: "ContentGranted", ref, account: consumer, until, premium: true });
  return until;
}
