// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { MalformedPayloadError } from "../common/errors.js";
import { errorMessage } from "../common/logger.js";

export const INTENT_PROTOCOL_ID = "/stellar/coordination/1.0.0";
export const VERIFY_PROTOCOL_ID = "/stellar/verify/1.0.0";

/** Largest intent the responder reads from one stream. */
export const REQUEST_READ_LIMIT = 16_384;
/** Largest response the initiator reads back. */
export const RESPONSE_READ_LIMIT = 65_536;

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Compact JSON, UTF-8. */
export function encodeMessage(message: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(message));
}

export function decodeMessage(bytes: Uint8Array): unknown {
  try {
    return JSON.parse(decoder.decode(bytes));
  } catch (err) {
    throw new MalformedPayloadError(`Invalid JSON: ${errorMessage(err)}`);
  }
}
