/**
 * Treasury: value entering and leaving the Catalog.
 *
 * `held` is debited before the host transfer runs, so a reentrant call made
 * from inside the transfer already sees the reduced balance.
 */

import { externalFailure } from "./errors.js";
import type { Identity } from "./host.js";
import type { CatalogState, LedgerScope } from "./state.js";

export function receive(state: CatalogState, amount: bigint): void {
  state.held += amount;
}

/** Transfer `amount` to `to`. Zero amounts are a no-op. */
export function payOut(scope: LedgerScope, to: Identity, amount: bigint): void {
  if (amount <= 0n) return;
  const { state, host } = scope;
  if (amount > state.held) {
    throw new Error(`treasury underflow: paying ${amount} from ${state.held}`);
  }

  state.held -= amount;
  try {
    host.send(to, amount);
  } catch (err) {
    throw externalFailure(err, `transfer of ${amount} to ${to}`);
  }
  scope.emit({ type: "CreditTransferred", to, amount });
}
