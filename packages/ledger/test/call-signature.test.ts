/**
 * Signed call tests: signing, verification, and call_id stability.
 */

import { describe, it, expect } from "vitest";
import { Value } from "@sinclair/typebox/value";
import {
  CallV1,
  canonicalDecode,
  canonicalEncode,
  computeCallId,
  generateKeypair,
  signCall,
  toHex,
  verifyCall,
  type UnsignedCall,
} from "../src/index.js";

async function unsigned(overrides: Partial<UnsignedCall> = {}) {
  const keys = await generateKeypair();
  const call: UnsignedCall = {
    v: 1,
    op: "getContent",
    from: toHex(keys.publicKey),
    args: { ref: "ab".repeat(32) },
    value: "100",
    ts: 1_700_000_000_000,
    ...overrides,
  };
  return { keys, call };
}

describe("signCall / verifyCall", () => {
  it("produces a schema-valid call that verifies", async () => {
    const { keys, call } = await unsigned();
    const signed = await signCall(keys.privateKey, call);

    expect(signed.sig).toMatch(/^[0-9a-f]{128}$/);
    expect(Value.Check(CallV1, signed)).toBe(true);
    expect(await verifyCall(signed)).toBe(true);
  });

  it("fails when any signed field changes", async () => {
    const { keys, call } = await unsigned();
    const signed = await signCall(keys.privateKey, call);

    expect(await verifyCall({ ...signed, value: "101" })).toBe(false);
    expect(await verifyCall({ ...signed, op: "getContentPremium" })).toBe(false);
    expect(await verifyCall({ ...signed, args: { ref: "cd".repeat(32) } })).toBe(false);
    expect(await verifyCall({ ...signed, ts: signed.ts + 1 })).toBe(false);
  });

  it("fails under another key", async () => {
    const { keys, call } = await unsigned();
    const other = await generateKeypair();
    const signed = await signCall(keys.privateKey, call);

    expect(await verifyCall({ ...signed, from: toHex(other.publicKey) })).toBe(false);
  });

  it("rejects malformed keys and signatures without throwing", async () => {
    const { keys, call } = await unsigned();
    const signed = await signCall(keys.privateKey, call);

    expect(await verifyCall({ ...signed, from: "zz" })).toBe(false);
    expect(await verifyCall({ ...signed, sig: "00" })).toBe(false);
  });
});

describe("computeCallId", () => {
  it("ignores the signature and key order", async () => {
    const { keys, call } = await unsigned();
    const signed = await signCall(keys.privateKey, call);
    const reordered: UnsignedCall = {
      ts: call.ts,
      value: call.value,
      args: call.args,
      from: call.from,
      op: call.op,
      v: call.v,
    };

    expect(computeCallId(signed)).toBe(computeCallId(call));
    expect(computeCallId(reordered)).toBe(computeCallId(call));
    expect(computeCallId(call)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("differs when the timestamp differs", async () => {
    const { call } = await unsigned();
    expect(computeCallId({ ...call, ts: call.ts + 1 })).not.toBe(computeCallId(call));
  });
});

describe("canonicalEncode", () => {
  it("encodes equal objects to equal bytes whatever the key order", () => {
    const a = canonicalEncode({ b: 1, a: { d: [1, 2], c: "x" } });
    const b = canonicalEncode({ a: { c: "x", d: [1, 2] }, b: 1 });

    expect(toHex(a)).toBe(toHex(b));
    expect(canonicalDecode(a)).toEqual({ a: { c: "x", d: [1, 2] }, b: 1 });
  });
});
