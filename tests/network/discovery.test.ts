import { describe, expect, it, vi } from "vitest";
import { parsePeerAddress } from "../../src/mesh/address.js";
import type { P2PHost } from "../../src/mesh/host.js";
import { createPeerKeys } from "../../src/mesh/peer.js";
import { Subscription } from "../../src/mesh/subscription.js";
import { DISCOVERY_TOPIC, DiscoveryLoop } from "../../src/network/discovery.js";
import { PeerDirectory } from "../../src/network/peer-directory.js";

const self = createPeerKeys().peerId;
const remote = createPeerKeys().peerId;
const remoteAddr = `/ip4/10.0.0.7/tcp/9000/p2p/${remote}`;

function encode(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

function fakeHost() {
  const subscriptions: Subscription[] = [];
  const topics: string[] = [];
  const host: Pick<P2PHost, "peerId" | "subscribe"> = {
    peerId: self,
    subscribe: (topic, signal) => {
      topics.push(topic);
      const sub = new Subscription(topic, () => undefined, signal);
      subscriptions.push(sub);
      return sub;
    }
  };
  return { host, subscriptions, topics };
}

describe("DiscoveryLoop.handleAnnouncement", () => {
  it("starts one connection attempt for an unseen peer", async () => {
    const onPeer = vi.fn(async () => undefined);
    const loop = new DiscoveryLoop({ host: fakeHost().host, directory: new PeerDirectory(), onPeer });
    loop.handleAnnouncement(encode(remoteAddr));
    expect(onPeer).toHaveBeenCalledWith(parsePeerAddress(remoteAddr));
  });

  it("ignores our own address", () => {
    const onPeer = vi.fn(async () => undefined);
    const loop = new DiscoveryLoop({ host: fakeHost().host, directory: new PeerDirectory(), onPeer });
    loop.handleAnnouncement(encode(`/ip4/10.0.0.1/tcp/9001/p2p/${self}`));
    expect(onPeer).not.toHaveBeenCalled();
  });

  it("ignores peers already in the directory", () => {
    const directory = new PeerDirectory();
    directory.add(parsePeerAddress(remoteAddr));
    const onPeer = vi.fn(async () => undefined);
    new DiscoveryLoop({ host: fakeHost().host, directory, onPeer }).handleAnnouncement(encode(remoteAddr));
    expect(onPeer).not.toHaveBeenCalled();
  });

  it("does not start a second attempt while one is in flight", async () => {
    let finish: () => void = () => undefined;
    const onPeer = vi.fn(
      () =>
        new Promise<void>((resolve) => {
          finish = resolve;
        })
    );
    const loop = new DiscoveryLoop({ host: fakeHost().host, directory: new PeerDirectory(), onPeer });
    loop.handleAnnouncement(encode(remoteAddr));
    loop.handleAnnouncement(encode(remoteAddr));
    expect(onPeer).toHaveBeenCalledTimes(1);

    finish();
    await vi.waitFor(() => {
      loop.handleAnnouncement(encode(remoteAddr));
      expect(onPeer).toHaveBeenCalledTimes(2);
    });
  });

  it("skips announcements that do not decode", () => {
    const onPeer = vi.fn(async () => undefined);
    const loop = new DiscoveryLoop({ host: fakeHost().host, directory: new PeerDirectory(), onPeer });
    loop.handleAnnouncement(Uint8Array.from([0xff, 0xfe, 0xfd]));
    loop.handleAnnouncement(encode("/ip4/10.0.0.7/tcp/9000"));
    loop.handleAnnouncement(encode("not a multiaddr"));
    expect(onPeer).not.toHaveBeenCalled();
  });

  it("contains a failing connection attempt", async () => {
    const onPeer = vi.fn(async () => {
      throw new Error("connect_failed: refused");
    });
    const loop = new DiscoveryLoop({ host: fakeHost().host, directory: new PeerDirectory(), onPeer });
    loop.handleAnnouncement(encode(remoteAddr));
    await vi.waitFor(() => {
      loop.handleAnnouncement(encode(remoteAddr));
      expect(onPeer).toHaveBeenCalledTimes(2);
    });
  });
});

describe("DiscoveryLoop.run", () => {
  it("dispatches announcements from the discovery topic until aborted", async () => {
    const { host, subscriptions, topics } = fakeHost();
    const onPeer = vi.fn(async () => undefined);
    const loop = new DiscoveryLoop({ host, directory: new PeerDirectory(), onPeer, backoffMs: 10 });
    const controller = new AbortController();
    const running = loop.run(controller.signal);

    await vi.waitFor(() => expect(loop.state).toBe("listening"));
    subscriptions[0].push(encode("garbage"));
    subscriptions[0].push(encode(remoteAddr));
    await vi.waitFor(() => expect(onPeer).toHaveBeenCalledTimes(1));

    controller.abort();
    await running;
    expect(topics).toEqual([DISCOVERY_TOPIC]);
    expect(loop.state).toBe("idle");
  });

  it("subscribes again after the subscription ends", async () => {
    const { host, subscriptions } = fakeHost();
    const loop = new DiscoveryLoop({ host, directory: new PeerDirectory(), onPeer: async () => undefined, backoffMs: 10 });
    const controller = new AbortController();
    const running = loop.run(controller.signal);

    await vi.waitFor(() => expect(subscriptions).toHaveLength(1));
    subscriptions[0].close();
    await vi.waitFor(() => expect(subscriptions).toHaveLength(2));

    controller.abort();
    await running;
  });

  it("backs off when subscribing throws", async () => {
    let calls = 0;
    const host: Pick<P2PHost, "peerId" | "subscribe"> = {
      peerId: self,
      subscribe: () => {
        calls += 1;
        throw new Error("host_not_listening");
      }
    };
    const loop = new DiscoveryLoop({ host, directory: new PeerDirectory(), onPeer: async () => undefined, backoffMs: 10 });
    const controller = new AbortController();
    const running = loop.run(controller.signal);
    await vi.waitFor(() => expect(calls).toBeGreaterThanOrEqual(2));
    controller.abort();
    await running;
  });
});
