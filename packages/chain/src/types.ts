/**
 * In-memory host types.
 *
 * The ExecutionHost / ContentManager seams themselves live in
 * @catalog/ledger; these are the knobs the in-memory versions add.
 */

import type { Identity } from "@catalog/ledger";

export interface Transfer {
  to: Identity;
  amount: bigint;
  /** Host time when the transfer ran, seconds. */
  at: number;
}

/**
 * Runs after a transfer to `account` lands, like a receiving contract's
 * fallback. Throwing fails the transfer.
 */
export type ReceiveHook = (amount: bigint) => void;

export interface MemoryHostOptions {
  /** External clock (seconds). Omit for a manual clock driven by advance(). */
  clock?: () => number;
  /** Manual clock start, seconds. Default: 0. */
  startTime?: number;
}

export interface MemoryContentManagerOptions {
  author: Identity;
  title: string;
  genre: number;
  /** Raw content bytes; the fingerprint is their SHA256. */
  content: Uint8Array;
}

export interface Grant {
  account: Identity;
  until: number;
}
