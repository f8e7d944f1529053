// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { randomUUID } from "node:crypto";
import { z } from "zod";
import { signPayload, verifyPayload } from "./peer.js";

const SEEN_CACHE_LIMIT = 5_000;
const DEFAULT_TTL_MS = 60_000;

export const pubSubMessageSchema = z.object({
  id: z.string().min(1),
  topic: z.string().min(1),
  fromPeerId: z.string().min(1),
  issuedAtMs: z.number(),
  ttlMs: z.number().positive(),
  data: z.string(),
  signature: z.string()
});

/** One broadcast on a pub/sub topic; `data` is base64. */
export type PubSubMessage = z.infer<typeof pubSubMessageSchema>;

export function canonicalizeMessage(message: Omit<PubSubMessage, "signature">): string {
  return JSON.stringify({
    id: message.id,
    topic: message.topic,
    fromPeerId: message.fromPeerId,
    issuedAtMs: message.issuedAtMs,
    ttlMs: message.ttlMs,
    data: message.data
  });
}

export class PubSubProtocol {
  private readonly seenIds = new Set<string>();

  createMessage(
    topic: string,
    fromPeerId: string,
    data: Uint8Array,
    privateKeyPem: string,
    ttlMs = DEFAULT_TTL_MS
  ): PubSubMessage {
    const unsigned = {
      id: randomUUID(),
      topic,
      fromPeerId,
      issuedAtMs: Date.now(),
      ttlMs,
      data: Buffer.from(data).toString("base64")
    };
    const signature = signPayload(canonicalizeMessage(unsigned), privateKeyPem);
    this.markSeen(unsigned.id);
    return { ...unsigned, signature };
  }

  /**
   * Accepts a message once. The signature is only checked when the origin's
   * key is known; relayed messages from peers we never met pass on
   * freshness and de-duplication alone.
   */
  validateMessage(message: PubSubMessage, originPublicKeyPem?: string): { ok: boolean; reason?: string } {
    if (this.seenIds.has(message.id)) {
      return { ok: false, reason: "duplicate_message" };
    }
    if (Date.now() > message.issuedAtMs + message.ttlMs) {
      return { ok: false, reason: "message_expired" };
    }
    if (originPublicKeyPem !== undefined) {
      const { signature, ...unsigned } = message;
      if (!verifyPayload(canonicalizeMessage(unsigned), signature, originPublicKeyPem)) {
        return { ok: false, reason: "invalid_signature" };
      }
    }
    this.markSeen(message.id);
    return { ok: true };
  }

  decodeData(message: PubSubMessage): Uint8Array {
    return new Uint8Array(Buffer.from(message.data, "base64"));
  }

  private markSeen(id: string): void {
    this.seenIds.add(id);
    if (this.seenIds.size > SEEN_CACHE_LIMIT) {
      const [first] = this.seenIds;
      if (first) this.seenIds.delete(first);
    }
  }
}
