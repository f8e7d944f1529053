import { mkdtempSync, readFileSync, statSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import bs58 from "bs58";
import { describe, expect, it } from "vitest";
import { createPeerKeys, loadOrCreatePeerKeys, peerIdFromPublicKey, signPayload, verifyPayload } from "../../src/mesh/peer.js";

describe("peer identity", () => {
  it("derives a sha2-256 multihash id from the public key", () => {
    const keys = createPeerKeys();
    expect(keys.peerId).toMatch(/^Qm/);
    const decoded = bs58.decode(keys.peerId);
    expect(decoded).toHaveLength(34);
    expect([decoded[0], decoded[1]]).toEqual([0x12, 0x20]);
    expect(peerIdFromPublicKey(keys.publicKeyPem)).toBe(keys.peerId);
  });

  it("gives distinct keys distinct ids", () => {
    expect(createPeerKeys().peerId).not.toBe(createPeerKeys().peerId);
  });

  it("signs and verifies payloads", () => {
    const keys = createPeerKeys();
    const signature = signPayload("hello", keys.privateKeyPem);
    expect(verifyPayload("hello", signature, keys.publicKeyPem)).toBe(true);
    expect(verifyPayload("hullo", signature, keys.publicKeyPem)).toBe(false);
    expect(verifyPayload("hello", signature, createPeerKeys().publicKeyPem)).toBe(false);
    expect(verifyPayload("hello", signature, "not a key")).toBe(false);
  });

  it("persists a generated identity and reloads it", () => {
    const file = join(mkdtempSync(join(tmpdir(), "peer-")), "nested", "identity.json");
    const created = loadOrCreatePeerKeys(file);
    expect(statSync(file).mode & 0o777).toBe(0o600);
    expect(JSON.parse(readFileSync(file, "utf8"))).toEqual({
      publicKeyPem: created.publicKeyPem,
      privateKeyPem: created.privateKeyPem
    });
    expect(loadOrCreatePeerKeys(file)).toEqual(created);
  });
});
