/**
 * JSON wire form. Amounts are bigint in the ledger and decimal strings on
 * the wire; bytes travel as hex.
 */

import { toHex } from "@catalog/ledger";

export function toWire(value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Uint8Array) return toHex(value);
  if (Array.isArray(value)) return value.map(toWire);
  if (value !== null && typeof value === "object") return wireRecord(value);
  return value;
}

export function wireRecord(obj: object): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    out[key] = toWire(value);
  }
  return out;
}
