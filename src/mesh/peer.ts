// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createHash, createPublicKey, generateKeyPairSync, sign, verify } from "node:crypto";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import bs58 from "bs58";
import { z } from "zod";

export interface PeerKeys {
  peerId: string;
  publicKeyPem: string;
  privateKeyPem: string;
}

// multihash header: sha2-256, 32-byte digest
const MULTIHASH_SHA256 = Uint8Array.from([0x12, 0x20]);

/**
 * Derives a base58btc multihash peer identifier ("Qm…") from an ed25519
 * public key, so the id is valid inside a /p2p/ multiaddress component.
 */
export function peerIdFromPublicKey(publicKeyPem: string): string {
  const der = createPublicKey(publicKeyPem).export({ type: "spki", format: "der" });
  const digest = createHash("sha256").update(der).digest();
  const multihash = new Uint8Array(MULTIHASH_SHA256.length + digest.length);
  multihash.set(MULTIHASH_SHA256, 0);
  multihash.set(digest, MULTIHASH_SHA256.length);
  return bs58.encode(multihash);
}

export function createPeerKeys(): PeerKeys {
  const keys = generateKeyPairSync("ed25519");
  const publicKeyPem = keys.publicKey.export({ type: "spki", format: "pem" }).toString();
  const privateKeyPem = keys.privateKey.export({ type: "pkcs8", format: "pem" }).toString();
  return { peerId: peerIdFromPublicKey(publicKeyPem), publicKeyPem, privateKeyPem };
}

const storedKeysSchema = z.object({
  publicKeyPem: z.string().min(1),
  privateKeyPem: z.string().min(1)
});

/**
 * Reads the identity stored at `path`, or generates one and writes it there.
 * A stable identity lets other agents pin this node as their bootstrap peer.
 */
export function loadOrCreatePeerKeys(path: string): PeerKeys {
  if (existsSync(path)) {
    const stored = storedKeysSchema.parse(JSON.parse(readFileSync(path, "utf8")));
    return { peerId: peerIdFromPublicKey(stored.publicKeyPem), ...stored };
  }
  const keys = createPeerKeys();
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(
    path,
    JSON.stringify({ publicKeyPem: keys.publicKeyPem, privateKeyPem: keys.privateKeyPem }, null, 2),
    { mode: 0o600 }
  );
  return keys;
}

export function signPayload(payload: string, privateKeyPem: string): string {
  return sign(null, Buffer.from(payload), privateKeyPem).toString("base64");
}

export function verifyPayload(payload: string, signature: string, publicKeyPem: string): boolean {
  try {
    return verify(null, Buffer.from(payload), publicKeyPem, Buffer.from(signature, "base64"));
  } catch {
    return false;
  }
}
