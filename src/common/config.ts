// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";

export const STELLAR_TESTNET_PASSPHRASE = "Test SDF Network ; September 2015";

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const envSchema = z.object({
  AGENT_ROLE: z.enum(["initiator", "responder"]).default("responder"),
  LISTEN_HOST: z.string().default("0.0.0.0"),
  LISTEN_PORT: z.coerce.number().int().min(0).max(65_535).optional(),
  ANNOUNCE_HOST: optionalString,
  PEER_KEY_FILE: optionalString,
  BOOTSTRAP_PEER_ID: optionalString,
  BOOTSTRAP_PEER_ADDRESS: optionalString,
  STELLAR_NETWORK_PASSPHRASE: z.string().default(STELLAR_TESTNET_PASSPHRASE),
  HORIZON_URL: z.string().url().default("https://horizon-testnet.stellar.org"),
  ONEINCH_API_URL: z.string().url().default("https://api.1inch.dev/swap/v5.2/11155111"),
  ONEINCH_API_KEY: optionalString,
  SWAP_FROM_ADDRESS: optionalString,
  INTENT_FILE: z.string().default("intents/sample-intent.json"),
  CONNECT_TIMEOUT_MS: z.coerce.number().int().positive().default(8_000),
  STREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info")
});

export type AgentKind = "initiator" | "responder";

export interface AgentConfig {
  role: AgentKind;
  listenHost: string;
  listenPort: number;
  announceHost?: string;
  peerKeyFile?: string;
  /** `<address>/p2p/<id>` when both halves are configured. */
  bootstrapPeer?: string;
  networkPassphrase: string;
  horizonUrl: string;
  oneInchApiUrl: string;
  oneInchApiKey?: string;
  swapFromAddress?: string;
  intentFile: string;
  connectTimeoutMs: number;
  streamTimeoutMs: number;
  logLevel: LogLevel;
}

const DEFAULT_PORTS: Record<AgentKind, number> = { responder: 9000, initiator: 9001 };

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`invalid environment: ${issues.join("; ")}`);
  }
  const e = parsed.data;

  if ((e.BOOTSTRAP_PEER_ID === undefined) !== (e.BOOTSTRAP_PEER_ADDRESS === undefined)) {
    throw new ConfigError("BOOTSTRAP_PEER_ID and BOOTSTRAP_PEER_ADDRESS must be set together");
  }
  const bootstrapPeer =
    e.BOOTSTRAP_PEER_ID && e.BOOTSTRAP_PEER_ADDRESS
      ? `${e.BOOTSTRAP_PEER_ADDRESS.replace(/\/+$/, "")}/p2p/${e.BOOTSTRAP_PEER_ID}`
      : undefined;

  return {
    role: e.AGENT_ROLE,
    listenHost: e.LISTEN_HOST,
    listenPort: e.LISTEN_PORT ?? DEFAULT_PORTS[e.AGENT_ROLE],
    announceHost: e.ANNOUNCE_HOST,
    peerKeyFile: e.PEER_KEY_FILE,
    bootstrapPeer,
    networkPassphrase: e.STELLAR_NETWORK_PASSPHRASE,
    horizonUrl: e.HORIZON_URL,
    oneInchApiUrl: e.ONEINCH_API_URL.replace(/\/+$/, ""),
    oneInchApiKey: e.ONEINCH_API_KEY,
    swapFromAddress: e.SWAP_FROM_ADDRESS,
    intentFile: e.INTENT_FILE,
    connectTimeoutMs: e.CONNECT_TIMEOUT_MS,
    streamTimeoutMs: e.STREAM_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL
  };
}
