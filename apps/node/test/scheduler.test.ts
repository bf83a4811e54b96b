/**
 * Distribution scheduler tests.
 *
 * Drives a real Catalog on a MemoryHost: skip on TooEarly and
 * NothingToDistribute, distribute once the window opens, report failures.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { Catalog, callFrom } from "@catalog/ledger";
import { MemoryContentManager, MemoryHost } from "@catalog/chain";
import { createDistributionScheduler } from "../src/scheduler.js";
import { DAY, START, TEST_CATALOG } from "./helpers.js";

const OWNER = "0e".repeat(32);
const AUTHOR = "a5".repeat(32);
const READER = "be".repeat(32);
const NODE = "9d".repeat(32);

// ── Helpers ────────────────────────────────────────────────────────

/** A catalog with one premium view pending. */
function setup() {
  const host = new MemoryHost({ startTime: START });
  const catalog = new Catalog({ owner: OWNER, host, config: TEST_CATALOG });
  const manager = new MemoryContentManager(
    { author: AUTHOR, title: "t", genre: 0, content: new Uint8Array([7]) },
    () => host.now(),
  );
  const ref = host.deploy(manager);
  catalog.publish(callFrom(AUTHOR), ref);
  catalog.buySubscription(callFrom(READER, 1_000n));
  catalog.getContentPremium(callFrom(READER), ref);
  return { host, catalog };
}

afterEach(() => {
  vi.useRealTimers();
});

describe("createDistributionScheduler", () => {
  it("tick() skips while the window is closed", () => {
    const { catalog } = setup();
    const onSkip = vi.fn();
    const scheduler = createDistributionScheduler(catalog, NODE, { onSkip });

    expect(scheduler.tick()).toBeNull();
    expect(onSkip).toHaveBeenCalledWith("TooEarly");
    expect(scheduler.lastDistribution()).toBeNull();
  });

  it("tick() distributes once the window opens, then skips with nothing pooled", () => {
    const { host, catalog } = setup();
    const onDistribute = vi.fn();
    const onSkip = vi.fn();
    const scheduler = createDistributionScheduler(catalog, NODE, { onDistribute, onSkip });
    host.advance(7 * DAY);

    const result = scheduler.tick();

    expect(result?.paid).toBe(1_000n);
    expect(onDistribute).toHaveBeenCalledWith(result);
    expect(scheduler.lastDistribution()).toBe(result);
    expect(host.balanceOf(AUTHOR)).toBe(1_000n);

    host.advance(7 * DAY);
    expect(scheduler.tick()).toBeNull();
    expect(onSkip).toHaveBeenCalledWith("NothingToDistribute");
  });

  it("reports other failures through onError", () => {
    const { host, catalog } = setup();
    const onError = vi.fn();
    const onSkip = vi.fn();
    const scheduler = createDistributionScheduler(catalog, NODE, { onError, onSkip });
    host.advance(7 * DAY);
    host.rejectTransfersTo(AUTHOR);

    expect(scheduler.tick()).toBeNull();
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toMatchObject({ code: "ExternalCallFailed" });
    expect(onSkip).not.toHaveBeenCalled();
  });

  it("start() ticks on the interval until stop()", () => {
    vi.useFakeTimers();
    const { catalog } = setup();
    const onSkip = vi.fn();
    const scheduler = createDistributionScheduler(catalog, NODE, { intervalMs: 1_000, onSkip });

    scheduler.start();
    scheduler.start();
    expect(scheduler.running()).toBe(true);

    vi.advanceTimersByTime(3_000);
    expect(onSkip).toHaveBeenCalledTimes(3);

    scheduler.stop();
    expect(scheduler.running()).toBe(false);
    vi.advanceTimersByTime(3_000);
    expect(onSkip).toHaveBeenCalledTimes(3);
  });
});
