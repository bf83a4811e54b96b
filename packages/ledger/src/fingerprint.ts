/**
 * Content fingerprints.
 *
 * fingerprint = SHA256(content_bytes), 32 bytes as lowercase hex.
 * Two publications with the same fingerprint are the same content,
 * whatever manager reference they arrive under.
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { canonicalEncode } from "./canonical.js";

/** 32-byte hex-encoded SHA256 hash. */
export type Fingerprint = string;

const HEX32 = /^[0-9a-f]{64}$/;

export function fingerprintOf(bytes: Uint8Array): Fingerprint {
  return bytesToHex(sha256(bytes));
}

/** SHA256 of a canonically-encoded object → hex. */
export function digestObject(obj: unknown): string {
  return bytesToHex(sha256(canonicalEncode(obj)));
}

export function isHex32(value: string): boolean {
  return HEX32.test(value);
}

export function fromHex(hex: string): Uint8Array {
  return hexToBytes(hex);
}

export function toHex(bytes: Uint8Array): string {
  return bytesToHex(bytes);
}
