// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createLogger, errorMessage } from "../common/logger.js";
import { pause } from "../common/timers.js";
import type { PeerAddress } from "../common/types.js";
import { parsePeerAddress } from "../mesh/address.js";
import type { P2PHost } from "../mesh/host.js";
import type { PeerDirectory } from "./peer-directory.js";

export const DISCOVERY_TOPIC = "/stellar/peers/v0.1";
const DEFAULT_BACKOFF_MS = 5_000;

const logger = createLogger("discovery");

export type DiscoveryState = "idle" | "subscribing" | "listening" | "decoding" | "dispatching" | "backoff";

export interface DiscoveryLoopOptions {
  host: Pick<P2PHost, "peerId" | "subscribe">;
  directory: PeerDirectory;
  /** Connection attempt for a newly announced peer; runs detached from the loop. */
  onPeer: (peer: PeerAddress) => Promise<unknown>;
  topic?: string;
  backoffMs?: number;
}

export class DiscoveryLoop {
  private current: DiscoveryState = "idle";
  private readonly inFlight = new Map<string, Promise<void>>();
  private readonly decoder = new TextDecoder("utf-8", { fatal: true });

  constructor(private readonly options: DiscoveryLoopOptions) {}

  get state(): DiscoveryState {
    return this.current;
  }

  async run(signal: AbortSignal): Promise<void> {
    const topic = this.options.topic ?? DISCOVERY_TOPIC;
    while (!signal.aborted) {
      this.current = "subscribing";
      try {
        const subscription = this.options.host.subscribe(topic, signal);
        this.current = "listening";
        logger.info("listening for peers", { topic });
        for await (const data of subscription) {
          this.handleAnnouncement(data);
          this.current = "listening";
        }
        if (signal.aborted) break;
        logger.warn("discovery subscription ended", { topic });
      } catch (err) {
        logger.error("discovery subscription failed", { topic, error: errorMessage(err) });
      }
      this.current = "backoff";
      if (!(await pause(this.options.backoffMs ?? DEFAULT_BACKOFF_MS, signal))) break;
    }
    await Promise.allSettled([...this.inFlight.values()]);
    this.current = "idle";
  }

  /** Decodes one announcement and starts a connection attempt for an unseen peer. */
  handleAnnouncement(data: Uint8Array): void {
    this.current = "decoding";
    let peer: PeerAddress;
    try {
      peer = parsePeerAddress(this.decoder.decode(data));
    } catch (err) {
      logger.warn("peer processing error", { error: errorMessage(err) });
      return;
    }
    if (peer.peerId === this.options.host.peerId) return;
    if (this.options.directory.has(peer) || this.inFlight.has(peer.multiaddr)) return;

    this.current = "dispatching";
    logger.info("discovered new peer", { multiaddr: peer.multiaddr });
    const attempt = this.options
      .onPeer(peer)
      .then(
        () => undefined,
        (err: unknown) => {
          logger.error("connection attempt failed", { multiaddr: peer.multiaddr, error: errorMessage(err) });
        }
      )
      .finally(() => {
        this.inFlight.delete(peer.multiaddr);
      });
    this.inFlight.set(peer.multiaddr, attempt);
  }
}
