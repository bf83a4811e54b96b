/**
 * Catalog node configuration.
 * All env access centralized here; no direct process.env elsewhere.
 */

import type { CatalogConfig } from "@catalog/ledger";

function env(key: string, fallback?: string): string {
  const val = process.env[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

/** Unset or empty → undefined, so the ledger default applies. */
function optionalInt(key: string): number | undefined {
  const raw = env(key, "");
  return raw === "" ? undefined : parseInt(raw, 10);
}

function optionalBigInt(key: string): bigint | undefined {
  const raw = env(key, "");
  return raw === "" ? undefined : BigInt(raw);
}

export const config = {
  port: parseInt(env("CATALOG_PORT", "3200"), 10),
  host: env("CATALOG_HOST", "0.0.0.0"),
  logLevel: env("LOG_LEVEL", "info"),
  /** Node identity seed (32 bytes hex). Empty = fresh keypair per start (dev). */
  nodePrivateKeyHex: env("NODE_PRIVATE_KEY_HEX", ""),
  /** Catalog owner public key (hex). Empty = the node identity owns it. */
  ownerPubkey: env("OWNER_PUBKEY", ""),
  /** Premium distribution attempt interval (ms). 0 = disabled. */
  distributionIntervalMs: parseInt(env("DISTRIBUTION_INTERVAL_MS", "60000"), 10),
  /** Max distance between a call's ts and the node clock (ms). */
  maxCallSkewMs: parseInt(env("MAX_CALL_SKEW_MS", "300000"), 10),
  /** Initial economic parameters; each falls back to the ledger default. */
  catalog: {
    contentFee: optionalBigInt("CONTENT_FEE"),
    contentPeriod: optionalInt("CONTENT_PERIOD"),
    premiumFee: optionalBigInt("PREMIUM_FEE"),
    premiumPeriod: optionalInt("PREMIUM_PERIOD"),
    premiumWithdrawalPeriod: optionalInt("PREMIUM_WITHDRAWAL_PERIOD"),
    payableViews: optionalInt("PAYABLE_VIEWS"),
  } satisfies Partial<CatalogConfig>,
} as const;
