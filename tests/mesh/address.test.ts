import { describe, expect, it } from "vitest";
import { formatMultiaddr, parsePeerAddress, peerBaseUrl } from "../../src/mesh/address.js";
import { createPeerKeys } from "../../src/mesh/peer.js";

const peerId = createPeerKeys().peerId;

describe("peer addresses", () => {
  it("parses an ip4 tcp address with a peer id", () => {
    expect(parsePeerAddress(`/ip4/192.168.1.20/tcp/9000/p2p/${peerId}`)).toEqual({
      peerId,
      multiaddr: `/ip4/192.168.1.20/tcp/9000/p2p/${peerId}`,
      host: "192.168.1.20",
      port: 9000
    });
  });

  it("requires a peer id", () => {
    expect(() => parsePeerAddress("/ip4/192.168.1.20/tcp/9000")).toThrow(/multiaddr_missing_peer_id/);
  });

  it("requires tcp", () => {
    expect(() => parsePeerAddress(`/ip4/192.168.1.20/udp/9000/p2p/${peerId}`)).toThrow(/multiaddr_not_tcp/);
  });

  it("formats addresses that parse back to the same peer", () => {
    const text = formatMultiaddr("127.0.0.1", 4100, peerId);
    expect(text).toBe(`/ip4/127.0.0.1/tcp/4100/p2p/${peerId}`);
    expect(parsePeerAddress(text).port).toBe(4100);
    expect(formatMultiaddr("::1", 4100, peerId)).toBe(`/ip6/::1/tcp/4100/p2p/${peerId}`);
    expect(formatMultiaddr("agent.local", 4100, peerId)).toBe(`/dns4/agent.local/tcp/4100/p2p/${peerId}`);
  });

  it("builds http base urls", () => {
    expect(peerBaseUrl({ host: "10.0.0.2", port: 9000 })).toBe("http://10.0.0.2:9000");
    expect(peerBaseUrl({ host: "::1", port: 9000 })).toBe("http://[::1]:9000");
  });
});
