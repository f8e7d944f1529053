// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export type AgentRole = "payer" | "recipient" | "oracle" | "swap_coordinator";

/** A dialable peer: transport address plus the identifier expected at the other end. */
export interface PeerAddress {
  readonly peerId: string;
  /** Full textual multiaddress including the trailing /p2p/<peerId>. */
  readonly multiaddr: string;
  readonly host: string;
  readonly port: number;
}

export enum ConnectionState {
  Disconnected = "disconnected",
  Connecting = "connecting",
  Connected = "connected"
}

export type ValidationResult =
  | { verdict: "valid" }
  | { verdict: "invalid"; reason: string }
  | { verdict: "malformed"; reason: string };

export interface SwapParams {
  fromToken: string;
  toToken: string;
  /** Base units, decimal string. */
  amount: string;
  /** Percent. */
  slippage: number;
  /** Seconds. */
  deadline: number;
}

export interface StellarSettlement {
  status: "SUCCESS";
  tx_hash: string;
  ledger: number;
}

export interface SwapTransaction {
  to: string;
  data: string;
  value: string;
  gas: number;
}

export type SwapOutcome =
  | { status: "SWAP_READY"; quote: Record<string, unknown>; tx: SwapTransaction }
  | { status: "ERROR"; reason: string };

/** A failed submission stops processing; a swap problem is reported next to a successful settlement. */
export type SettlementOutcome =
  | { status: "ERROR"; reason: string }
  | { stellar: StellarSettlement; swap?: SwapOutcome };

export type IntentResponse =
  | { status: "PROCESSED"; results: SettlementOutcome }
  | { status: "ERROR"; reason: string }
  | { status: "INVALID"; reason: string }
  | { status: "UNSUPPORTED_INTENT_TYPE" };

export interface VerificationResponse {
  status: "VALID" | "INVALID" | "ERROR";
  message: string;
  valid_signature?: boolean;
  source_account?: string;
  reason?: string;
  account_sequence?: string;
}
