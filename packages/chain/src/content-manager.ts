/**
 * MemoryContentManager: holds one content item and its access grants.
 *
 * A grant is rejected while the same account still holds an unexpired one,
 * so buying the same content twice in a row fails at the manager.
 */

import { fingerprintOf, type ContentManager, type ContentManagerInfo, type Identity } from "@catalog/ledger";
import type { Grant, MemoryContentManagerOptions } from "./types.js";

export class MemoryContentManager implements ContentManager {
  private readonly info: ContentManagerInfo;
  private readonly content: Uint8Array;
  private readonly grants = new Map<Identity, number>();
  private readonly clock: () => number;

  constructor(options: MemoryContentManagerOptions, clock: () => number) {
    this.content = options.content.slice();
    this.info = {
      author: options.author,
      title: options.title,
      genre: options.genre,
      fingerprint: fingerprintOf(this.content),
    };
    this.clock = clock;
  }

  getInfo(): ContentManagerInfo {
    return { ...this.info };
  }

  grantAccess(account: Identity, until: number): void {
    const current = this.grants.get(account);
    if (current !== undefined && current >= this.clock()) {
      throw new Error(`access for ${account} still valid until ${current}`);
    }
    this.grants.set(account, until);
  }

  hasAccess(account: Identity): boolean {
    const until = this.grants.get(account);
    return until !== undefined && until >= this.clock();
  }

  /** Content bytes for an account holding a live grant; null otherwise. */
  read(account: Identity): Uint8Array | null {
    return this.hasAccess(account) ? this.content.slice() : null;
  }

  listGrants(): Grant[] {
    return [...this.grants].map(([account, until]) => ({ account, until }));
  }
}
