/**
 * Ed25519 sign + verify via @noble/ed25519.
 *
 * The async API hashes with WebCrypto SHA-512, so no sha512Sync hook is
 * needed on Node 20.
 */

import { getPublicKeyAsync, signAsync, verifyAsync, utils } from "@noble/ed25519";

/**
 * Generate an Ed25519 keypair.
 * Returns raw bytes: { publicKey: 32 bytes, privateKey: 32 bytes (seed) }.
 */
export async function generateKeypair(): Promise<{
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}> {
  const privateKey = utils.randomPrivateKey();
  const publicKey = await getPublicKeyAsync(privateKey);
  return { publicKey, privateKey };
}

export async function publicKeyFromSeed(privateKey: Uint8Array): Promise<Uint8Array> {
  return getPublicKeyAsync(privateKey);
}

export async function ed25519Sign(
  privateKey: Uint8Array,
  message: Uint8Array,
): Promise<Uint8Array> {
  return signAsync(message, privateKey);
}

/**
 * Verify an Ed25519 signature. Malformed keys or signatures verify false.
 */
export async function ed25519Verify(
  publicKey: Uint8Array,
  signature: Uint8Array,
  message: Uint8Array,
): Promise<boolean> {
  try {
    return await verifyAsync(signature, message, publicKey);
  } catch {
    return false;
  }
}
