/**
 * ContentRegistry: published content, publish-once semantics, discovery queries.
 *
 * A content item is identified by its manager reference and deduplicated by
 * fingerprint: the same bytes cannot be published twice, even behind a
 * different manager. Nothing is ever unpublished.
 */

import { CatalogError } from "./errors.js";
import type { ContentRef, Identity } from "./host.js";
import type { CatalogState, ContentInfo, LedgerScope } from "./state.js";
import { registerAuthor } from "./author-ledger.js";
import { fetchManagerInfo, requireContent } from "./access-bridge.js";
import { nonNegativeInteger } from "./guards.js";

// ── Publish ────────────────────────────────────────────────────────

export function publish(scope: LedgerScope, caller: Identity, ref: ContentRef): ContentInfo {
  const { state, host, now } = scope;
  const info = fetchManagerInfo(host, ref);

  if (info.author !== caller) {
    throw new CatalogError(
      "PermissionDenied",
      `${caller} cannot publish content authored by ${info.author}`,
    );
  }
  // A ref registers once even if its manager later reports different bytes.
  if (state.fingerprints.has(info.fingerprint)) {
    throw new CatalogError("DuplicateContent", `fingerprint ${info.fingerprint} already published`);
  }
  if (state.contentIndex.has(ref)) {
    throw new CatalogError("DuplicateContent", `${ref} already published`);
  }

  const content: ContentInfo = {
    ref,
    author: info.author,
    title: info.title,
    genre: info.genre,
    fingerprint: info.fingerprint,
    publishedAt: now,
    views: 0,
  };
  state.contentIndex.set(ref, state.contents.length);
  state.contents.push(content);
  state.fingerprints.add(info.fingerprint);

  if (registerAuthor(state, info.author)) {
    scope.emit({ type: "NewAuthor", author: info.author });
  }
  scope.emit({
    type: "NewContentPublished",
    ref,
    author: info.author,
    title: info.title,
    genre: info.genre,
  });
  return { ...content };
}

// ── Queries ────────────────────────────────────────────────────────

export function getContentInfo(state: CatalogState, ref: ContentRef): ContentInfo {
  return { ...requireContent(state, ref) };
}

export function getContentList(state: CatalogState): ContentRef[] {
  return state.contents.map((c) => c.ref);
}

export function getStatistics(state: CatalogState): { refs: ContentRef[]; views: number[] } {
  return {
    refs: state.contents.map((c) => c.ref),
    views: state.contents.map((c) => c.views),
  };
}

/**
 * The `n` most recently published refs, newest first. Returns fewer than `n`
 * when fewer exist; there is no padding.
 */
export function getNewContentList(state: CatalogState, n: number): ContentRef[] {
  nonNegativeInteger(n, "n");
  const out: ContentRef[] = [];
  for (let i = state.contents.length - 1; i >= 0 && out.length < n; i--) {
    const content = state.contents[i];
    if (content) out.push(content.ref);
  }
  return out;
}

function latestWhere(
  state: CatalogState,
  match: (c: ContentInfo) => boolean,
): ContentRef | null {
  for (let i = state.contents.length - 1; i >= 0; i--) {
    const content = state.contents[i];
    if (content && match(content)) return content.ref;
  }
  return null;
}

/** Ascending scan with >=: on equal views the later publication wins. */
function mostPopularWhere(
  state: CatalogState,
  match: (c: ContentInfo) => boolean,
): ContentRef | null {
  let best: ContentInfo | null = null;
  for (const content of state.contents) {
    if (!match(content)) continue;
    if (best === null || content.views >= best.views) best = content;
  }
  return best?.ref ?? null;
}

export function getLatestByGenre(state: CatalogState, genre: number): ContentRef | null {
  return latestWhere(state, (c) => c.genre === genre);
}

export function getLatestByAuthor(state: CatalogState, author: Identity): ContentRef | null {
  return latestWhere(state, (c) => c.author === author);
}

export function getMostPopularByGenre(state: CatalogState, genre: number): ContentRef | null {
  return mostPopularWhere(state, (c) => c.genre === genre);
}

export function getMostPopularByAuthor(state: CatalogState, author: Identity): ContentRef | null {
  return mostPopularWhere(state, (c) => c.author === author);
}
