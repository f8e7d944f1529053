// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createLogger, errorMessage } from "../common/logger.js";
import { pause } from "../common/timers.js";
import { ConnectionState, type PeerAddress } from "../common/types.js";
import type { P2PHost } from "../mesh/host.js";
import type { PeerDirectory } from "./peer-directory.js";

const DEFAULT_FALLBACK_INTERVAL_MS = 10_000;

const logger = createLogger("connections");

export interface ConnectionManagerOptions {
  host: Pick<P2PHost, "connect" | "hasConnection" | "ping">;
  directory: PeerDirectory;
  /** Delivers the initial intent; true once the exchange completed at the transport level. */
  sendInitialIntent: (peerId: string) => Promise<boolean>;
  fallbackIntervalMs?: number;
}

/**
 * Owns the agent's ConnectionState. Disconnected → Connecting while an
 * initial intent is in flight → Connected once one was delivered. A failed
 * liveness ping of the active peer drops back to Disconnected.
 */
export class ConnectionManager {
  private current = ConnectionState.Disconnected;
  private activePeerId: string | undefined;

  constructor(private readonly options: ConnectionManagerOptions) {}

  get state(): ConnectionState {
    return this.current;
  }

  get activePeer(): string | undefined {
    return this.activePeerId;
  }

  /** Returns whether the transport connection succeeded. */
  async connectToPeer(peer: PeerAddress): Promise<boolean> {
    try {
      logger.info("attempting connection", { peerId: peer.peerId, multiaddr: peer.multiaddr });
      await this.options.host.connect(peer);
    } catch (err) {
      logger.error("connection failed", { peerId: peer.peerId, error: errorMessage(err) });
      return false;
    }
    this.options.directory.add(peer);
    logger.info("successfully connected", { peerId: peer.peerId });

    if (this.current === ConnectionState.Disconnected) {
      await this.deliverInitialIntent(peer.peerId);
    }
    return true;
  }

  /** Direct connect to the well-known peer; failure is logged and otherwise ignored. */
  async bootstrap(peer: PeerAddress | undefined): Promise<boolean> {
    if (!peer) return false;
    logger.info("attempting direct connection to bootstrap peer", { peerId: peer.peerId });
    return this.connectToPeer(peer);
  }

  async runFallbackLoop(signal: AbortSignal): Promise<void> {
    const intervalMs = this.options.fallbackIntervalMs ?? DEFAULT_FALLBACK_INTERVAL_MS;
    while (!signal.aborted) {
      try {
        await this.tick();
      } catch (err) {
        logger.error("fallback tick failed", { error: errorMessage(err) });
      }
      if (!(await pause(intervalMs, signal))) return;
    }
  }

  /** One pass of the maintenance loop: liveness check, then directory fallback. */
  async tick(): Promise<void> {
    if (this.current === ConnectionState.Connecting) return;
    if (this.current === ConnectionState.Connected) {
      const peerId = this.activePeerId;
      if (peerId !== undefined && (await this.options.host.ping(peerId))) return;
      logger.warn("active peer unreachable", { peerId });
      this.markDisconnected();
    }
    for (const peer of this.options.directory.all()) {
      if (!(await this.redial(peer))) continue;
      if (await this.deliverInitialIntent(peer.peerId)) return;
    }
  }

  /** Reconnects a directory peer whose connection was dropped, e.g. after gossip eviction. */
  private async redial(peer: PeerAddress): Promise<boolean> {
    if (this.options.host.hasConnection(peer.peerId)) return true;
    try {
      await this.options.host.connect(peer);
      logger.info("reconnected to known peer", { peerId: peer.peerId });
      return true;
    } catch (err) {
      logger.debug("known peer still unreachable", { peerId: peer.peerId, error: errorMessage(err) });
      return false;
    }
  }

  markDisconnected(): void {
    this.current = ConnectionState.Disconnected;
    this.activePeerId = undefined;
  }

  private async deliverInitialIntent(peerId: string): Promise<boolean> {
    this.current = ConnectionState.Connecting;
    let delivered = false;
    try {
      delivered = await this.options.sendInitialIntent(peerId);
    } catch (err) {
      logger.error("initial intent failed", { peerId, error: errorMessage(err) });
    }
    if (delivered) {
      this.current = ConnectionState.Connected;
      this.activePeerId = peerId;
      logger.info("connected state reached", { peerId });
    } else if (this.current === ConnectionState.Connecting) {
      this.current = ConnectionState.Disconnected;
    }
    return delivered;
  }
}
