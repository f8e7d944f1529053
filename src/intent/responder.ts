// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { MalformedPayloadError } from "../common/errors.js";
import { createLogger, errorMessage } from "../common/logger.js";
import type { AgentRole, IntentResponse, SettlementOutcome, ValidationResult } from "../common/types.js";
import type { IntentStream, StreamHandler } from "../mesh/stream.js";
import { decodeMessage, encodeMessage, isRecord, REQUEST_READ_LIMIT } from "./protocol.js";
import { formatIssues, PAYMENT_INTENT_TYPE, paymentIntentSchema, type PaymentIntent } from "./schema.js";

const logger = createLogger("intent-responder");

export interface IntentResponderDeps {
  validate(intent: unknown): ValidationResult;
  orchestrator: { settle(intent: PaymentIntent): Promise<SettlementOutcome> };
  role: AgentRole;
}

export async function processIntent(raw: Uint8Array, deps: IntentResponderDeps): Promise<IntentResponse> {
  let payload: unknown;
  try {
    payload = decodeMessage(raw);
  } catch (err) {
    if (err instanceof MalformedPayloadError) return { status: "ERROR", reason: err.message };
    throw err;
  }
  if (!isRecord(payload)) {
    return { status: "ERROR", reason: "Invalid intent: payload must be a JSON object" };
  }
  if (typeof payload.xdr !== "string" || payload.xdr.length === 0) {
    return { status: "ERROR", reason: "No XDR provided" };
  }
  if (payload.type !== PAYMENT_INTENT_TYPE || deps.role !== "swap_coordinator") {
    return { status: "UNSUPPORTED_INTENT_TYPE" };
  }

  const parsed = paymentIntentSchema.safeParse(payload);
  if (!parsed.success) {
    return { status: "ERROR", reason: `Invalid intent: ${formatIssues(parsed.error)}` };
  }

  const validation = deps.validate(parsed.data);
  if (validation.verdict !== "valid") {
    logger.warn("intent rejected", { verdict: validation.verdict, reason: validation.reason });
    return { status: "INVALID", reason: validation.reason };
  }

  const results = await deps.orchestrator.settle(parsed.data);
  return { status: "PROCESSED", results };
}

/** Stream handler for the coordination protocol: one intent in, one response out. */
export function createIntentHandler(deps: IntentResponderDeps): StreamHandler {
  return async (stream: IntentStream) => {
    try {
      const raw = await stream.read(REQUEST_READ_LIMIT);
      let response: IntentResponse;
      try {
        response = await processIntent(raw, deps);
      } catch (err) {
        logger.error("intent processing failed", { peerId: stream.remotePeerId, error: errorMessage(err) });
        response = { status: "ERROR", reason: errorMessage(err) };
      }
      logger.info("intent handled", { peerId: stream.remotePeerId, status: response.status });
      await stream.write(encodeMessage(response));
    } finally {
      await stream.close();
    }
  };
}
