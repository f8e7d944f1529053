// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { PeerAddress } from "../common/types.js";

/**
 * Known peers keyed by full multiaddress. Grows without bound. `all()` hands
 * out a snapshot, so peers added while a caller walks it show up on the next
 * call only.
 */
export class PeerDirectory {
  private readonly peers = new Map<string, PeerAddress>();

  /** Returns true when the peer was not known before. */
  add(peer: PeerAddress): boolean {
    if (this.peers.has(peer.multiaddr)) return false;
    this.peers.set(peer.multiaddr, peer);
    return true;
  }

  has(peer: Pick<PeerAddress, "multiaddr">): boolean {
    return this.peers.has(peer.multiaddr);
  }

  all(): PeerAddress[] {
    return [...this.peers.values()];
  }

  get size(): number {
    return this.peers.size;
  }
}
