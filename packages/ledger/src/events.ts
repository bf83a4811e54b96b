/**
 * Catalog events: ordered, append-only, observation only.
 *
 * Events raised inside a failed call are dropped with its rollback; the
 * state machine never reads them back.
 */

import type { ConfigKey } from "./schemas/config.js";
import type { ContentRef, Identity } from "./host.js";

export type CatalogEvent =
  | { type: "NewAuthor"; author: Identity }
  | {
      type: "NewContentPublished";
      ref: ContentRef;
      author: Identity;
      title: string;
      genre: number;
    }
  | { type: "NewPremiumSubscription"; account: Identity; expiration: number }
  | {
      type: "ContentGranted";
      ref: ContentRef;
      account: Identity;
      until: number;
      premium: boolean;
    }
  /** Advisory: the author has reached payableViews. Fires on every later view too. */
  | { type: "CreditAvailable"; author: Identity }
  | { type: "CreditTransferred"; to: Identity; amount: bigint }
  | {
      type: "PremiumDistributed";
      credit: bigint;
      views: number;
      paid: bigint;
      forfeited: bigint;
    }
  | { type: "ConfigChanged"; key: ConfigKey; value: string }
  | { type: "CatalogClosed"; owner: Identity; residual: bigint };

export type CatalogEventType = CatalogEvent["type"];

export type CatalogEventListener = (event: CatalogEvent) => void;
