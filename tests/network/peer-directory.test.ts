import { describe, expect, it } from "vitest";
import { parsePeerAddress } from "../../src/mesh/address.js";
import { createPeerKeys } from "../../src/mesh/peer.js";
import { PeerDirectory } from "../../src/network/peer-directory.js";

const peerId = createPeerKeys().peerId;

describe("PeerDirectory", () => {
  it("adds a peer once per multiaddress", () => {
    const directory = new PeerDirectory();
    const peer = parsePeerAddress(`/ip4/10.0.0.2/tcp/9000/p2p/${peerId}`);
    expect(directory.add(peer)).toBe(true);
    expect(directory.add(parsePeerAddress(`/ip4/10.0.0.2/tcp/9000/p2p/${peerId}`))).toBe(false);
    expect(directory.size).toBe(1);
    expect(directory.has(peer)).toBe(true);
  });

  it("treats another address of the same peer as a separate entry", () => {
    const directory = new PeerDirectory();
    directory.add(parsePeerAddress(`/ip4/10.0.0.2/tcp/9000/p2p/${peerId}`));
    directory.add(parsePeerAddress(`/ip4/10.0.0.3/tcp/9000/p2p/${peerId}`));
    expect(directory.size).toBe(2);
  });

  it("hands out snapshots that later additions do not change", () => {
    const directory = new PeerDirectory();
    directory.add(parsePeerAddress(`/ip4/10.0.0.2/tcp/9000/p2p/${peerId}`));
    const snapshot = directory.all();
    directory.add(parsePeerAddress(`/ip4/10.0.0.4/tcp/9000/p2p/${peerId}`));
    expect(snapshot).toHaveLength(1);
    expect(directory.all()).toHaveLength(2);
  });
});
