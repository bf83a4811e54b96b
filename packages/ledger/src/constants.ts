/**
 * Catalog constants.
 *
 * DEFAULT_* values seed a new Catalog when the deployer leaves a parameter
 * unset. All of them are owner-tunable at run time except the wire version.
 */

// ── Wire ───────────────────────────────────────────────────────────
export const CALL_VERSION = 1;

// ── Pay-per-view ───────────────────────────────────────────────────
export const DEFAULT_CONTENT_FEE = 1_000n;
export const DEFAULT_CONTENT_PERIOD = 24 * 60 * 60; // 1 day, seconds
export const DEFAULT_PAYABLE_VIEWS = 10;

// ── Premium ────────────────────────────────────────────────────────
export const DEFAULT_PREMIUM_FEE = 20_000n;
export const DEFAULT_PREMIUM_PERIOD = 30 * 24 * 60 * 60; // 30 days
export const DEFAULT_PREMIUM_WITHDRAWAL_PERIOD = 7 * 24 * 60 * 60; // weekly split

// ── Limits ─────────────────────────────────────────────────────────
export const MAX_TITLE_LENGTH = 256;
export const MAX_CONTENT_BYTES = 1_048_576; // 1 MiB, in-memory managers only
