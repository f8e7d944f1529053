// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { TransportError } from "../common/errors.js";
import { createLogger, errorMessage } from "../common/logger.js";
import { pause } from "../common/timers.js";
import type { P2PHost } from "../mesh/host.js";
import { DISCOVERY_TOPIC } from "./discovery.js";

const DEFAULT_INTERVAL_MS = 30_000;
const DEFAULT_RETRY_MS = 5_000;

const logger = createLogger("advertiser");

export interface AdvertisementLoopOptions {
  host: Pick<P2PHost, "getMultiaddrs" | "publish">;
  topic?: string;
  intervalMs?: number;
  retryMs?: number;
}

/** Publishes our own multiaddress on the discovery topic until aborted. */
export class AdvertisementLoop {
  private published = 0;
  private readonly encoder = new TextEncoder();

  constructor(private readonly options: AdvertisementLoopOptions) {}

  get publishedCount(): number {
    return this.published;
  }

  async run(signal: AbortSignal): Promise<void> {
    const topic = this.options.topic ?? DISCOVERY_TOPIC;
    while (!signal.aborted) {
      let delayMs = this.options.intervalMs ?? DEFAULT_INTERVAL_MS;
      try {
        const [address] = this.options.host.getMultiaddrs();
        if (!address) throw new TransportError("no_listen_address", "host reports no multiaddrs");
        await this.options.host.publish(topic, this.encoder.encode(address));
        this.published += 1;
        logger.debug("published our address", { address });
      } catch (err) {
        logger.error("advertising error", { error: errorMessage(err) });
        delayMs = this.options.retryMs ?? DEFAULT_RETRY_MS;
      }
      if (!(await pause(delayMs, signal))) return;
    }
  }
}
