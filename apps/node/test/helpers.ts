/**
 * Node test fixtures: keypairs, signed calls, an app on a manual clock.
 */

import type { FastifyInstance } from "fastify";
import { MemoryHost } from "@catalog/chain";
import {
  generateKeypair,
  signCall,
  toHex,
  type CallOp,
  type CallV1,
  type CatalogConfig,
} from "@catalog/ledger";
import { buildApp } from "../src/server.js";
import type { NodeIdentity } from "../src/identity.js";

export const START = 1_000;
export const DAY = 24 * 60 * 60;

export const TEST_CATALOG: CatalogConfig = {
  contentFee: 100n,
  contentPeriod: 3_600,
  premiumFee: 1_000n,
  premiumPeriod: 30 * DAY,
  premiumWithdrawalPeriod: 7 * DAY,
  payableViews: 1,
};

export async function newIdentity(): Promise<NodeIdentity> {
  const keys = await generateKeypair();
  return { publicKey: toHex(keys.publicKey), privateKey: keys.privateKey };
}

export async function signed(
  who: NodeIdentity,
  op: CallOp,
  args: Record<string, unknown> = {},
  value = "0",
  ts = Date.now(),
): Promise<CallV1> {
  return signCall(who.privateKey, { v: 1, op, from: who.publicKey, args, value, ts });
}

export interface TestNode {
  app: FastifyInstance;
  host: MemoryHost;
  node: NodeIdentity;
  owner: NodeIdentity;
}

export async function startNode(): Promise<TestNode> {
  const host = new MemoryHost({ startTime: START });
  const node = await newIdentity();
  const owner = await newIdentity();
  const app = await buildApp({
    host,
    identity: node,
    owner: owner.publicKey,
    catalogConfig: TEST_CATALOG,
    logLevel: "silent",
    distributionIntervalMs: 0,
    maxCallSkewMs: 60_000,
  });
  return { app, host, node, owner };
}

export function utf8Hex(text: string): string {
  return toHex(new TextEncoder().encode(text));
}
