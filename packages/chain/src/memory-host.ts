/**
 * MemoryHost: an ExecutionHost that keeps everything in process.
 *
 * Balances are credited when the Catalog sends value out. Savepoints journal
 * those transfers so a failed call leaves no trace. Use rejectTransfersTo()
 * and onReceive() to model payees that fail or call back in.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";
import type {
  ContentManager,
  ContentRef,
  ExecutionHost,
  Identity,
  Savepoint,
} from "@catalog/ledger";
import type { MemoryHostOptions, ReceiveHook, Transfer } from "./types.js";

export class MemoryHost implements ExecutionHost {
  private readonly balances = new Map<Identity, bigint>();
  private readonly managers = new Map<ContentRef, ContentManager>();
  private readonly rejecting = new Set<Identity>();
  private readonly hooks = new Map<Identity, ReceiveHook>();
  private readonly journal: Transfer[] = [];
  private readonly clock: (() => number) | undefined;
  private time: number;
  private deployed = 0;

  constructor(options: MemoryHostOptions = {}) {
    this.clock = options.clock;
    this.time = options.startTime ?? 0;
  }

  // ── ExecutionHost ────────────────────────────────────────────────

  now(): number {
    return this.clock ? this.clock() : this.time;
  }

  send(to: Identity, amount: bigint): void {
    if (amount <= 0n) {
      throw new Error(`MemoryHost: transfer amount must be positive, got ${amount}`);
    }
    if (this.rejecting.has(to)) {
      throw new Error(`MemoryHost: ${to} rejects transfers`);
    }

    this.journal.push({ to, amount, at: this.now() });
    this.balances.set(to, this.balanceOf(to) + amount);

    const hook = this.hooks.get(to);
    if (hook) hook(amount);
  }

  savepoint(): Savepoint {
    const mark = this.journal.length;
    let open = true;
    return {
      rollback: () => {
        if (!open) throw new Error("MemoryHost: savepoint already closed");
        open = false;
        const undone = this.journal.splice(mark);
        for (const t of undone) {
          this.balances.set(t.to, this.balanceOf(t.to) - t.amount);
        }
      },
      release: () => {
        if (!open) throw new Error("MemoryHost: savepoint already closed");
        open = false;
      },
    };
  }

  contentManager(ref: ContentRef): ContentManager | undefined {
    return this.managers.get(ref);
  }

  // ── Deployment ───────────────────────────────────────────────────

  /**
   * Register a content manager. Without an explicit ref, one is derived
   * from a deployment counter.
   */
  deploy(manager: ContentManager, ref?: ContentRef): ContentRef {
    this.deployed += 1;
    const address = ref ?? bytesToHex(sha256(utf8ToBytes(`content-manager:${this.deployed}`)));
    if (this.managers.has(address)) {
      throw new Error(`MemoryHost: ${address} already deployed`);
    }
    this.managers.set(address, manager);
    return address;
  }

  // ── Clock ────────────────────────────────────────────────────────

  advance(seconds: number): number {
    this.requireManualClock();
    this.time += seconds;
    return this.time;
  }

  setTime(seconds: number): void {
    this.requireManualClock();
    this.time = seconds;
  }

  private requireManualClock(): void {
    if (this.clock) throw new Error("MemoryHost: clock is external");
  }

  // ── Payees ───────────────────────────────────────────────────────

  balanceOf(account: Identity): bigint {
    return this.balances.get(account) ?? 0n;
  }

  /** Every transfer that is still in effect, in order. */
  transfers(): readonly Transfer[] {
    return [...this.journal];
  }

  rejectTransfersTo(account: Identity, reject = true): void {
    if (reject) this.rejecting.add(account);
    else this.rejecting.delete(account);
  }

  onReceive(account: Identity, hook: ReceiveHook | null): void {
    if (hook) this.hooks.set(account, hook);
    else this.hooks.delete(account);
  }
}
