// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createLogger, errorMessage } from "../common/logger.js";
import type { AgentRole, PeerAddress } from "../common/types.js";
import { INTENT_PROTOCOL_ID, VERIFY_PROTOCOL_ID } from "../intent/protocol.js";
import { createIntentHandler } from "../intent/responder.js";
import { validateIntent } from "../intent/validator.js";
import { createVerificationHandler } from "../intent/verifier-protocol.js";
import type { LedgerClient } from "../ledger/stellar.js";
import type { TransportHost } from "../mesh/host.js";
import { AdvertisementLoop } from "../network/advertiser.js";
import { DiscoveryLoop } from "../network/discovery.js";
import { PeerDirectory } from "../network/peer-directory.js";
import { SettlementOrchestrator } from "../settlement/orchestrator.js";
import type { SwapQuoteClient } from "../swap/oneinch.js";

const logger = createLogger("responder");

export interface ResponderAgentOptions {
  host: TransportHost;
  ledger: LedgerClient;
  swap: SwapQuoteClient;
  role?: AgentRole;
  /** Dialled once after startup; failure is not fatal. */
  directPeer?: PeerAddress;
  advertiseIntervalMs?: number;
  discoveryBackoffMs?: number;
}

/** Validates and settles intents arriving on the coordination protocol. */
export class ResponderAgent {
  readonly directory = new PeerDirectory();
  private readonly discovery: DiscoveryLoop;
  private readonly advertiser: AdvertisementLoop;

  constructor(private readonly options: ResponderAgentOptions) {
    const { host, ledger } = options;
    const validate = (intent: unknown) => validateIntent(intent, ledger);
    host.setStreamHandler(
      INTENT_PROTOCOL_ID,
      createIntentHandler({
        validate,
        orchestrator: new SettlementOrchestrator(ledger, options.swap),
        role: options.role ?? "swap_coordinator"
      })
    );
    host.setStreamHandler(VERIFY_PROTOCOL_ID, createVerificationHandler({ validate, ledger }));

    this.discovery = new DiscoveryLoop({
      host,
      directory: this.directory,
      onPeer: async (peer) => {
        this.directory.add(peer);
        logger.info("peer discovered", { peerId: peer.peerId, multiaddr: peer.multiaddr });
      },
      backoffMs: options.discoveryBackoffMs
    });
    this.advertiser = new AdvertisementLoop({ host, intervalMs: options.advertiseIntervalMs });
  }

  async run(signal: AbortSignal): Promise<void> {
    const { host } = this.options;
    await host.start();
    logger.info("responder listening", { peerId: host.peerId, addrs: host.getMultiaddrs() });
    try {
      const loops = Promise.all([this.discovery.run(signal), this.advertiser.run(signal)]);
      if (this.options.directPeer) await this.dialDirectPeer(this.options.directPeer);
      await loops;
    } finally {
      await host.stop();
      logger.info("responder stopped");
    }
  }

  private async dialDirectPeer(peer: PeerAddress): Promise<void> {
    try {
      await this.options.host.connect(peer);
      this.directory.add(peer);
      logger.info("connected to configured peer", { peerId: peer.peerId });
    } catch (err) {
      logger.warn("configured peer unreachable", { peerId: peer.peerId, error: errorMessage(err) });
    }
  }
}
