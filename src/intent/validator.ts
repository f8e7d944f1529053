// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { errorMessage } from "../common/logger.js";
import type { ValidationResult } from "../common/types.js";
import type { LedgerClient } from "../ledger/stellar.js";
import { isRecord } from "./protocol.js";

export type EnvelopeChecker = Pick<LedgerClient, "parseEnvelope" | "verifyEnvelope">;

/** Structural and cryptographic checks on an intent's envelope. Never throws. */
export function validateIntent(intent: unknown, ledger: EnvelopeChecker): ValidationResult {
  try {
    if (!isRecord(intent)) {
      return { verdict: "malformed", reason: "Intent must be a JSON object" };
    }
    const xdr = intent.xdr;
    if (typeof xdr !== "string" || xdr.length === 0) {
      return { verdict: "malformed", reason: "Missing XDR transaction envelope" };
    }

    const parsed = ledger.parseEnvelope(xdr);
    if (!parsed.ok) {
      return { verdict: "malformed", reason: parsed.error.message };
    }
    const envelope = parsed.value;
    if (envelope.signatureCount === 0) {
      return { verdict: "invalid", reason: "No signatures present" };
    }
    if (BigInt(envelope.sequence) === 0n) {
      return { verdict: "invalid", reason: "Invalid sequence number (0)" };
    }

    const verified = ledger.verifyEnvelope(envelope);
    if (!verified.ok) {
      return { verdict: "invalid", reason: verified.error.message };
    }
    return { verdict: "valid" };
  } catch (err) {
    return { verdict: "malformed", reason: errorMessage(err) };
  }
}
