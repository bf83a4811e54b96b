/**
 * Premium distribution scheduler.
 *
 * Every `intervalMs` the node calls distributePremiumCredits under its own
 * identity. The Catalog enforces premiumWithdrawalPeriod itself, so most
 * ticks end in TooEarly or NothingToDistribute; those are reported as skips,
 * not errors.
 */

import {
  callFrom,
  isCatalogError,
  type Catalog,
  type CatalogErrorCode,
  type DistributionResult,
  type Identity,
} from "@catalog/ledger";

export interface SchedulerOptions {
  /** How often to attempt a distribution (ms). Default: 60_000 (1 min). */
  intervalMs?: number;
  /** Called after a distribution commits. */
  onDistribute?: (result: DistributionResult) => void;
  /** Called when the Catalog declines the attempt. */
  onSkip?: (reason: CatalogErrorCode) => void;
  /** Called for anything else. */
  onError?: (error: unknown) => void;
}

export interface DistributionScheduler {
  start(): void;
  stop(): void;
  running(): boolean;
  /** Attempt one distribution now. */
  tick(): DistributionResult | null;
  lastDistribution(): DistributionResult | null;
}

const DEFAULT_INTERVAL_MS = 60_000;

const SKIP_CODES: readonly CatalogErrorCode[] = ["TooEarly", "NothingToDistribute", "CatalogClosed"];

export function createDistributionScheduler(
  catalog: Catalog,
  caller: Identity,
  options: SchedulerOptions = {},
): DistributionScheduler {
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  const onError = options.onError ?? ((err) => console.error("[scheduler] error:", err));

  let timer: ReturnType<typeof setInterval> | null = null;
  let last: DistributionResult | null = null;

  function tick(): DistributionResult | null {
    try {
      const result = catalog.distributePremiumCredits(callFrom(caller));
      last = result;
      options.onDistribute?.(result);
      return result;
    } catch (err) {
      if (isCatalogError(err) && SKIP_CODES.includes(err.code)) {
        options.onSkip?.(err.code);
      } else {
        onError(err);
      }
      return null;
    }
  }

  return {
    start() {
      if (timer) return;
      timer = setInterval(tick, intervalMs);
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    running() {
      return timer !== null;
    },

    tick,

    lastDistribution() {
      return last;
    },
  };
}
