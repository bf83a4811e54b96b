/**
 * Node identity: the Ed25519 key the node acts under (scheduler calls,
 * default catalog owner).
 */

import { fromHex, generateKeypair, publicKeyFromSeed, toHex } from "@catalog/ledger";

export interface NodeIdentity {
  /** Public key, hex. Used as the node's Catalog identity. */
  publicKey: string;
  privateKey: Uint8Array;
}

export async function loadIdentity(privateKeyHex: string): Promise<NodeIdentity> {
  if (privateKeyHex === "") {
    const keys = await generateKeypair();
    return { publicKey: toHex(keys.publicKey), privateKey: keys.privateKey };
  }
  if (!/^[0-9a-f]{64}$/.test(privateKeyHex)) {
    throw new Error("NODE_PRIVATE_KEY_HEX must be 32 bytes of lowercase hex");
  }
  const privateKey = fromHex(privateKeyHex);
  return { publicKey: toHex(await publicKeyFromSeed(privateKey)), privateKey };
}
