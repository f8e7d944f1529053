// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { request } from "undici";
import { createLogger, errorMessage } from "../common/logger.js";
import type { PubSubMessage } from "./protocol.js";

const MAX_CONSECUTIVE_FAILURES = 5;
const BROADCAST_TIMEOUT_MS = 10_000;

const logger = createLogger("gossip");

/** A peer we completed a handshake with, in either direction. */
export interface Neighbour {
  peerId: string;
  publicKeyPem: string;
  multiaddr: string;
  baseUrl: string;
  protocols: string[];
}

export class GossipMesh {
  private neighbours = new Map<string, Neighbour>();
  private failureCounts = new Map<string, number>();

  constructor(private readonly localPeerId: string) {}

  addNeighbour(neighbour: Neighbour): void {
    this.neighbours.set(neighbour.peerId, neighbour);
    this.failureCounts.delete(neighbour.peerId);
  }

  removeNeighbour(peerId: string): void {
    this.neighbours.delete(peerId);
    this.failureCounts.delete(peerId);
  }

  getNeighbour(peerId: string): Neighbour | undefined {
    return this.neighbours.get(peerId);
  }

  listNeighbours(): Neighbour[] {
    return [...this.neighbours.values()];
  }

  async broadcast(message: PubSubMessage, exclude: ReadonlySet<string> = new Set()): Promise<{ delivered: number; failed: number }> {
    const targets = this.listNeighbours().filter((n) => !exclude.has(n.peerId));
    let delivered = 0;
    let failed = 0;
    const serialized = JSON.stringify(message);

    await Promise.all(
      targets.map(async (neighbour) => {
        try {
          const res = await request(`${neighbour.baseUrl}/p2p/pubsub`, {
            method: "POST",
            headers: { "content-type": "application/json", "x-peer-id": this.localPeerId },
            body: serialized,
            signal: AbortSignal.timeout(BROADCAST_TIMEOUT_MS)
          });
          const body = await res.body.text().catch(() => "");
          if (res.statusCode >= 200 && res.statusCode < 300) {
            delivered += 1;
            this.failureCounts.delete(neighbour.peerId);
          } else {
            logger.warn("broadcast rejected", { peerId: neighbour.peerId, statusCode: res.statusCode, body });
            failed += 1;
            this.recordFailure(neighbour.peerId);
          }
        } catch (err) {
          logger.warn("broadcast error", { peerId: neighbour.peerId, error: errorMessage(err) });
          failed += 1;
          this.recordFailure(neighbour.peerId);
        }
      })
    );

    if (targets.length > 0) {
      logger.debug("broadcast", { topic: message.topic, targets: targets.length, delivered, failed });
    }
    return { delivered, failed };
  }

  private recordFailure(peerId: string): void {
    const count = (this.failureCounts.get(peerId) ?? 0) + 1;
    this.failureCounts.set(peerId, count);
    if (count >= MAX_CONSECUTIVE_FAILURES) {
      logger.warn("evicting neighbour after consecutive failures", { peerId, count });
      this.removeNeighbour(peerId);
    }
  }
}
