/**
 * Call guards. Each operation composes the ones it needs at its start.
 */

import { CatalogError } from "./errors.js";
import type { CallContext } from "./host.js";
import type { CatalogState } from "./state.js";

export function whileOpen(state: CatalogState): void {
  if (state.closed) {
    throw new CatalogError("CatalogClosed", "catalog has been closed");
  }
}

export function onlyOwner(state: CatalogState, ctx: CallContext): void {
  if (ctx.caller !== state.owner) {
    throw new CatalogError("PermissionDenied", `${ctx.caller} is not the owner`);
  }
}

/** Payment must match the price exactly; no change is made. */
export function exactValue(ctx: CallContext, expected: bigint, what: string): void {
  if (ctx.value !== expected) {
    throw new CatalogError(
      "WrongValue",
      `${what} costs ${expected}, call carried ${ctx.value}`,
    );
  }
}

export function noValue(ctx: CallContext): void {
  if (ctx.value !== 0n) {
    throw new CatalogError("WrongValue", `call accepts no value, carried ${ctx.value}`);
  }
}

export function nonNegativeInteger(value: number, name: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new CatalogError("InvalidArgument", `${name} must be a non-negative integer`);
  }
}
