/**
 * CallV1 operations: signing payload, call_id, sign, verify.
 *
 * The signature covers the canonical-encoded payload, not the JSON wire
 * format, so field order and whitespace never change a call's identity.
 */

import type { CallV1 } from "./schemas/call.js";
import { canonicalEncode } from "./canonical.js";
import { digestObject, fromHex, isHex32, toHex } from "./fingerprint.js";
import { ed25519Sign, ed25519Verify } from "./ed25519.js";

export type UnsignedCall = Omit<CallV1, "sig">;

/** Everything except sig: the bytes that get signed and hashed. */
export function callSigningPayload(call: CallV1 | UnsignedCall): Record<string, unknown> {
  return {
    v: call.v,
    op: call.op,
    from: call.from,
    args: call.args,
    value: call.value,
    ts: call.ts,
  };
}

/** call_id = SHA256(canonical(CallV1 minus sig)), hex. */
export function computeCallId(call: CallV1 | UnsignedCall): string {
  return digestObject(callSigningPayload(call));
}

export async function signCall(privateKey: Uint8Array, call: UnsignedCall): Promise<CallV1> {
  const message = canonicalEncode(callSigningPayload(call));
  const sig = await ed25519Sign(privateKey, message);
  return { ...call, sig: toHex(sig) };
}

/**
 * Checks Ed25519(call.from, call.sig, canonical(CallV1 minus sig)).
 */
export async function verifyCall(call: CallV1): Promise<boolean> {
  if (!isHex32(call.from)) return false;
  if (!/^[0-9a-f]{128}$/.test(call.sig)) return false;

  const message = canonicalEncode(callSigningPayload(call));
  return ed25519Verify(fromHex(call.from), fromHex(call.sig), message);
}
