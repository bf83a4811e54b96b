/** Sorted-key CBOR for signed call envelopes; call ids and signatures cover these bytes. */

import { Encoder } from "cbor-x";

const encoder = new Encoder({
  structuredClone: false,
  mapsAsObjects: true,
  useRecords: false,
  pack: false,
});

function sortKeys(obj: unknown): unknown {
  if (obj === null || obj === undefined) return obj;
  if (obj instanceof Uint8Array) return obj;
  if (Array.isArray(obj)) return obj.map(sortKeys);
  if (typeof obj === "object") {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(obj).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, value] of entries) {
      sorted[key] = sortKeys(value);
    }
    return sorted;
  }
  return obj;
}

/** Sort keys lexicographically, then CBOR encode. */
export function canonicalEncode(obj: unknown): Uint8Array {
  return encoder.encode(sortKeys(obj));
}

export function canonicalDecode(bytes: Uint8Array): unknown {
  return encoder.decode(bytes);
}
