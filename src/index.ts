#!/usr/bin/env node
// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import dotenv from "dotenv";
import { InitiatorAgent } from "./agent/initiator-agent.js";
import { ResponderAgent } from "./agent/responder-agent.js";
import { loadConfig, type AgentConfig } from "./common/config.js";
import { BindError, ConfigError } from "./common/errors.js";
import { errorMessage, log, setLogLevel } from "./common/logger.js";
import { StellarLedgerClient } from "./ledger/stellar.js";
import { parsePeerAddress } from "./mesh/address.js";
import { TransportHost } from "./mesh/host.js";
import { createPeerKeys, loadOrCreatePeerKeys } from "./mesh/peer.js";
import { OneInchQuoteClient } from "./swap/oneinch.js";

interface Agent {
  run(signal: AbortSignal): Promise<void>;
}

function buildAgent(config: AgentConfig): Agent {
  const keys = config.peerKeyFile ? loadOrCreatePeerKeys(config.peerKeyFile) : createPeerKeys();
  const host = new TransportHost({
    keys,
    listenHost: config.listenHost,
    listenPort: config.listenPort,
    announceHost: config.announceHost,
    connectTimeoutMs: config.connectTimeoutMs,
    streamTimeoutMs: config.streamTimeoutMs
  });
  const bootstrapPeer = config.bootstrapPeer ? parsePeerAddress(config.bootstrapPeer) : undefined;

  if (config.role === "initiator") {
    return new InitiatorAgent({ host, intentFile: config.intentFile, bootstrapPeer });
  }
  return new ResponderAgent({
    host,
    ledger: new StellarLedgerClient({ horizonUrl: config.horizonUrl, networkPassphrase: config.networkPassphrase }),
    swap: new OneInchQuoteClient({
      baseUrl: config.oneInchApiUrl,
      apiKey: config.oneInchApiKey,
      fromAddress: config.swapFromAddress
    }),
    directPeer: bootstrapPeer
  });
}

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  setLogLevel(config.logLevel);
  log.info("starting agent", { role: config.role, port: config.listenPort });

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    log.info("shutdown requested", { signal });
    controller.abort();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await buildAgent(config).run(controller.signal);
}

main().catch((err: unknown) => {
  if (err instanceof BindError || err instanceof ConfigError) {
    log.error("fatal startup error", { code: err.code, error: err.message });
  } else {
    log.error("agent crashed", { error: errorMessage(err) });
  }
  process.exit(1);
});
