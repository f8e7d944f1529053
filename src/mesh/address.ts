// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { networkInterfaces } from "node:os";
import { multiaddr } from "@multiformats/multiaddr";
import type { PeerAddress } from "../common/types.js";

/**
 * Parses `/ip4/<host>/tcp/<port>/p2p/<peerId>` (ip6, dns4, dns6 and dns hosts
 * are accepted too). Throws when the address is not a TCP address or carries
 * no peer identifier.
 */
export function parsePeerAddress(text: string): PeerAddress {
  const ma = multiaddr(text.trim());
  const peerId = ma.getPeerId();
  if (!peerId) {
    throw new Error(`multiaddr_missing_peer_id: ${text}`);
  }
  const options = ma.toOptions();
  if (options.transport !== "tcp") {
    throw new Error(`multiaddr_not_tcp: ${text}`);
  }
  return { peerId, multiaddr: ma.toString(), host: options.host, port: options.port };
}

export function formatMultiaddr(host: string, port: number, peerId: string): string {
  const family = host.includes(":") ? "ip6" : /^[\d.]+$/.test(host) ? "ip4" : "dns4";
  return multiaddr(`/${family}/${host}/tcp/${port}`).encapsulate(`/p2p/${peerId}`).toString();
}

/** Base URL the HTTP transport uses to reach a peer. */
export function peerBaseUrl(peer: Pick<PeerAddress, "host" | "port">): string {
  const host = peer.host.includes(":") ? `[${peer.host}]` : peer.host;
  return `http://${host}:${peer.port}`;
}

/** First non-internal IPv4 address, falling back to loopback. */
export function getLocalIpAddress(): string {
  for (const addresses of Object.values(networkInterfaces())) {
    const external = addresses?.find((iface) => iface.family === "IPv4" && !iface.internal);
    if (external) return external.address;
  }
  return "127.0.0.1";
}
