// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { MalformedPayloadError } from "../common/errors.js";
import { createLogger, errorMessage } from "../common/logger.js";
import type { ValidationResult, VerificationResponse } from "../common/types.js";
import type { LedgerClient } from "../ledger/stellar.js";
import type { IntentStream, StreamHandler } from "../mesh/stream.js";
import { decodeMessage, encodeMessage, isRecord, REQUEST_READ_LIMIT } from "./protocol.js";

const logger = createLogger("verifier");

export interface VerificationDeps {
  validate(intent: unknown): ValidationResult;
  ledger: Pick<LedgerClient, "parseEnvelope" | "loadAccount">;
}

/** Checks an intent without settling it. */
export async function processVerification(raw: Uint8Array, deps: VerificationDeps): Promise<VerificationResponse> {
  let payload: unknown;
  try {
    payload = decodeMessage(raw);
  } catch (err) {
    if (err instanceof MalformedPayloadError) return { status: "ERROR", message: err.message };
    throw err;
  }
  if (!isRecord(payload) || payload.xdr === undefined || payload.metadata === undefined) {
    return { status: "ERROR", message: "Missing required fields. Expected: xdr, metadata" };
  }

  const validation = deps.validate(payload);
  const valid = validation.verdict === "valid";
  const response: VerificationResponse = {
    status: valid ? "VALID" : "INVALID",
    message: "Intent processed",
    valid_signature: valid
  };
  if (validation.verdict !== "valid") response.reason = validation.reason;
  // the sender's own claim, reported even when the envelope does not parse
  if (isRecord(payload.metadata) && typeof payload.metadata.source === "string") {
    response.source_account = payload.metadata.source;
  }

  if (typeof payload.xdr === "string") {
    const parsed = deps.ledger.parseEnvelope(payload.xdr);
    if (parsed.ok) {
      const account = await deps.ledger.loadAccount(parsed.value.source);
      if (account.ok) {
        response.account_sequence = account.value.sequence;
      } else {
        logger.debug("account lookup failed", { source: parsed.value.source, reason: account.error.message });
      }
    }
  }
  return response;
}

export function createVerificationHandler(deps: VerificationDeps): StreamHandler {
  return async (stream: IntentStream) => {
    try {
      const raw = await stream.read(REQUEST_READ_LIMIT);
      let response: VerificationResponse;
      try {
        response = await processVerification(raw, deps);
      } catch (err) {
        response = { status: "ERROR", message: errorMessage(err) };
      }
      logger.info("verification handled", { peerId: stream.remotePeerId, status: response.status });
      await stream.write(encodeMessage(response));
    } finally {
      await stream.close();
    }
  };
}
