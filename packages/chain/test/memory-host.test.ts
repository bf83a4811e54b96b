/**
 * MemoryHost tests: clock, transfers, savepoint journaling, and a full
 * Catalog running on top of it.
 */

import { describe, it, expect, vi } from "vitest";
import { Catalog, callFrom } from "@catalog/ledger";
import { MemoryContentManager, MemoryHost } from "../src/index.js";

const OWNER = "0e".repeat(32);
const AUTHOR = "a5".repeat(32);
const READER = "be".repeat(32);

describe("clock", () => {
  it("runs manually from startTime", () => {
    const host = new MemoryHost({ startTime: 500 });
    expect(host.now()).toBe(500);
    expect(host.advance(25)).toBe(525);
    host.setTime(10);
    expect(host.now()).toBe(10);
  });

  it("defers to an external clock and refuses manual changes", () => {
    const clock = vi.fn(() => 42);
    const host = new MemoryHost({ clock });
    expect(host.now()).toBe(42);
    expect(() => host.advance(1)).toThrow("clock is external");
    expect(() => host.setTime(1)).toThrow("clock is external");
  });
});

describe("send", () => {
  it("credits the payee and journals the transfer", () => {
    const host = new MemoryHost({ startTime: 7 });
    host.send(READER, 30n);
    host.send(READER, 12n);

    expect(host.balanceOf(READER)).toBe(42n);
    expect(host.transfers()).toEqual([
      { to: READER, amount: 30n, at: 7 },
      { to: READER, amount: 12n, at: 7 },
    ]);
  });

  it("refuses non-positive amounts", () => {
    const host = new MemoryHost();
    expect(() => host.send(READER, 0n)).toThrow("must be positive");
  });

  it("honours rejectTransfersTo until lifted", () => {
    const host = new MemoryHost();
    host.rejectTransfersTo(READER);
    expect(() => host.send(READER, 1n)).toThrow("rejects transfers");

    host.rejectTransfersTo(READER, false);
    host.send(READER, 1n);
    expect(host.balanceOf(READER)).toBe(1n);
  });

  it("runs the receive hook after crediting", () => {
    const host = new MemoryHost();
    const seen: bigint[] = [];
    host.onReceive(READER, (amount) => seen.push(host.balanceOf(READER) + amount));

    host.send(READER, 5n);
    host.onReceive(READER, null);
    host.send(READER, 5n);

    expect(seen).toEqual([10n]);
  });
});

describe("savepoint", () => {
  it("rollback undoes transfers made since it opened", () => {
    const host = new MemoryHost();
    host.send(READER, 10n);
    const sp = host.savepoint();
    host.send(READER, 5n);
    host.send(AUTHOR, 3n);

    sp.rollback();

    expect(host.balanceOf(READER)).toBe(10n);
    expect(host.balanceOf(AUTHOR)).toBe(0n);
    expect(host.transfers()).toHaveLength(1);
  });

  it("release keeps transfers", () => {
    const host = new MemoryHost();
    const sp = host.savepoint();
    host.send(READER, 5n);
    sp.release();
    expect(host.balanceOf(READER)).toBe(5n);
  });

  it("closes once", () => {
    const host = new MemoryHost();
    const sp = host.savepoint();
    sp.release();
    expect(() => sp.rollback()).toThrow("already closed");
  });
});

describe("deploy", () => {
  it("derives distinct refs and rejects reuse", () => {
    const host = new MemoryHost();
    const m = new MemoryContentManager(
      { author: AUTHOR, title: "t", genre: 0, content: new Uint8Array([1]) },
      () => host.now(),
    );
    const r1 = host.deploy(m);
    const r2 = host.deploy(m);

    expect(r1).toMatch(/^[0-9a-f]{64}$/);
    expect(r2).not.toBe(r1);
    expect(host.contentManager(r1)).toBe(m);
    expect(() => host.deploy(m, r1)).toThrow("already deployed");
  });
});

describe("Catalog on MemoryHost", () => {
  it("runs a purchase, a withdrawal and a rejected transfer end to end", () => {
    const host = new MemoryHost({ startTime: 1_000 });
    const catalog = new Catalog({
      owner: OWNER,
      host,
      config: { contentFee: 10n, contentPeriod: 60, payableViews: 1 },
    });
    const manager = new MemoryContentManager(
      { author: AUTHOR, title: "Notes", genre: 3, content: new TextEncoder().encode("hello") },
      () => host.now(),
    );
    const ref = host.deploy(manager);

    catalog.publish(callFrom(AUTHOR), ref);
    expect(catalog.getContent(callFrom(READER, 10n), ref)).toBe(1_060);
    expect(manager.hasAccess(READER)).toBe(true);

    // The manager refuses a second grant while the first is live.
    expect(() => catalog.getContent(callFrom(READER, 10n), ref)).toThrow("still valid");
    expect(catalog.getContentInfo(ref).views).toBe(1);

    host.rejectTransfersTo(AUTHOR);
    expect(() => catalog.withdraw(callFrom(AUTHOR))).toThrow("rejects transfers");
    expect(host.balanceOf(AUTHOR)).toBe(0n);

    host.rejectTransfersTo(AUTHOR, false);
    expect(catalog.withdraw(callFrom(AUTHOR))).toBe(10n);
    expect(host.balanceOf(AUTHOR)).toBe(10n);
  });

  it("keeps premium content closed to non-subscribers on a clock starting at zero", () => {
    const host = new MemoryHost();
    const catalog = new Catalog({ owner: OWNER, host });
    const manager = new MemoryContentManager(
      { author: AUTHOR, title: "Notes", genre: 3, content: new TextEncoder().encode("hello") },
      () => host.now(),
    );
    const ref = host.deploy(manager);
    catalog.publish(callFrom(AUTHOR), ref);

    expect(host.now()).toBe(0);
    expect(catalog.isPremium(READER)).toBe(false);
    expect(() => catalog.getContentPremium(callFrom(READER), ref)).toThrow(
      `${READER} has no active subscription`,
    );
    expect(manager.hasAccess(READER)).toBe(false);
    expect(catalog.getAuthorInfo(AUTHOR).premiumViews).toBe(0);
    expect(catalog.getPool().premiumViews).toBe(0);
  });
});
