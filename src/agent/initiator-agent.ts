// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createLogger, errorMessage } from "../common/logger.js";
import type { PeerAddress } from "../common/types.js";
import { loadIntentTemplate, sendIntent } from "../intent/initiator.js";
import type { TransportHost } from "../mesh/host.js";
import { AdvertisementLoop } from "../network/advertiser.js";
import { ConnectionManager } from "../network/connection-manager.js";
import { DiscoveryLoop } from "../network/discovery.js";
import { PeerDirectory } from "../network/peer-directory.js";

const logger = createLogger("initiator");

export interface InitiatorAgentOptions {
  host: TransportHost;
  intentFile: string;
  bootstrapPeer?: PeerAddress;
  fallbackIntervalMs?: number;
  advertiseIntervalMs?: number;
  discoveryBackoffMs?: number;
}

/** Finds a coordinator on the mesh and hands it the intent template. */
export class InitiatorAgent {
  readonly directory = new PeerDirectory();
  readonly connections: ConnectionManager;
  private readonly discovery: DiscoveryLoop;
  private readonly advertiser: AdvertisementLoop;

  constructor(private readonly options: InitiatorAgentOptions) {
    const { host } = options;
    this.connections = new ConnectionManager({
      host,
      directory: this.directory,
      sendInitialIntent: (peerId) => this.sendTemplate(peerId),
      fallbackIntervalMs: options.fallbackIntervalMs
    });
    this.discovery = new DiscoveryLoop({
      host,
      directory: this.directory,
      onPeer: (peer) => this.connections.connectToPeer(peer),
      backoffMs: options.discoveryBackoffMs
    });
    this.advertiser = new AdvertisementLoop({ host, intervalMs: options.advertiseIntervalMs });
  }

  async run(signal: AbortSignal): Promise<void> {
    const { host } = this.options;
    await host.start();
    logger.info("initiator listening", { peerId: host.peerId, addrs: host.getMultiaddrs() });
    try {
      await this.connections.bootstrap(this.options.bootstrapPeer);
      await Promise.all([
        this.discovery.run(signal),
        this.advertiser.run(signal),
        this.connections.runFallbackLoop(signal)
      ]);
    } finally {
      await host.stop();
      logger.info("initiator stopped");
    }
  }

  private async sendTemplate(peerId: string): Promise<boolean> {
    let payload: unknown;
    try {
      payload = await loadIntentTemplate(this.options.intentFile);
    } catch (err) {
      logger.error("could not read intent template", { file: this.options.intentFile, error: errorMessage(err) });
      return false;
    }
    return sendIntent(this.options.host, peerId, payload);
  }
}
