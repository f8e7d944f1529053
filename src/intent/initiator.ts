// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { readFile } from "node:fs/promises";
import { createLogger, errorMessage } from "../common/logger.js";
import type { P2PHost } from "../mesh/host.js";
import type { IntentStream } from "../mesh/stream.js";
import { decodeMessage, encodeMessage, INTENT_PROTOCOL_ID, RESPONSE_READ_LIMIT } from "./protocol.js";

const logger = createLogger("intent-initiator");

/**
 * Opens a coordination stream, sends `payload` and logs whatever the
 * responder answers. Resolves true when the exchange completed.
 */
export async function sendIntent(
  host: Pick<P2PHost, "openStream">,
  peerId: string,
  payload: unknown
): Promise<boolean> {
  let stream: IntentStream;
  try {
    stream = await host.openStream(peerId, INTENT_PROTOCOL_ID);
  } catch (err) {
    logger.warn("could not open intent stream", { peerId, error: errorMessage(err) });
    return false;
  }

  try {
    await stream.write(encodeMessage(payload));
    const reply = await stream.read(RESPONSE_READ_LIMIT);
    const response = decodeMessage(reply);
    logger.info("intent response", { peerId, response });
    return true;
  } catch (err) {
    logger.warn("intent exchange failed", { peerId, error: errorMessage(err) });
    return false;
  } finally {
    try {
      await stream.close();
    } catch (err) {
      logger.warn("stream close failed", { peerId, error: errorMessage(err) });
    }
  }
}

export async function loadIntentTemplate(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, "utf8"));
}
