// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { request, type Dispatcher } from "undici";
import { StreamError } from "../common/errors.js";
import { errorMessage } from "../common/logger.js";

/**
 * One request/response exchange with a peer under a protocol identifier.
 * Writes happen before reads; closing is idempotent.
 */
export interface IntentStream {
  readonly protocolId: string;
  readonly remotePeerId: string;
  write(data: Uint8Array): Promise<void>;
  /** Resolves with at most `maxBytes` bytes; an empty array once drained. */
  read(maxBytes: number): Promise<Uint8Array>;
  close(): Promise<void>;
}

export type StreamHandler = (stream: IntentStream) => Promise<void>;

export interface OutboundTarget {
  baseUrl: string;
  localPeerId: string;
  timeoutMs: number;
}

/** Dialer side: `write` sends the request, `read` waits for the reply. */
export class OutboundStream implements IntentStream {
  private response: Promise<Dispatcher.ResponseData> | undefined;
  private readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | undefined;
  private drained = false;
  private closed = false;

  constructor(
    readonly remotePeerId: string,
    readonly protocolId: string,
    private readonly target: OutboundTarget
  ) {}

  async write(data: Uint8Array): Promise<void> {
    if (this.closed) throw new StreamError("stream_closed");
    if (this.response) throw new StreamError("stream_write_after_send: request already sent");

    this.timer = setTimeout(() => this.controller.abort(), this.target.timeoutMs);
    this.response = request(`${this.target.baseUrl}/p2p/stream`, {
      method: "POST",
      headers: {
        "content-type": "application/octet-stream",
        "x-protocol-id": this.protocolId,
        "x-peer-id": this.target.localPeerId
      },
      body: Buffer.from(data),
      signal: this.controller.signal
    });
    // read() reports the failure; an unread stream must not leave a rejection unhandled
    this.response.catch(() => undefined);
  }

  async read(maxBytes: number): Promise<Uint8Array> {
    if (this.closed) throw new StreamError("stream_closed");
    if (!this.response) throw new StreamError("stream_read_before_write");
    if (this.drained) return new Uint8Array(0);
    this.drained = true;
    try {
      const res = await this.response;
      const body = Buffer.from(await res.body.arrayBuffer());
      if (res.statusCode !== 200) {
        throw new StreamError(`remote_status_${res.statusCode}: ${body.toString("utf8").slice(0, 200)}`);
      }
      return new Uint8Array(body.subarray(0, maxBytes));
    } catch (err) {
      if (err instanceof StreamError) throw err;
      if (this.controller.signal.aborted) {
        throw new StreamError(`stream_timeout after ${this.target.timeoutMs}ms`, { cause: err });
      }
      throw new StreamError(errorMessage(err), { cause: err });
    } finally {
      clearTimeout(this.timer);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    clearTimeout(this.timer);
    if (this.response && !this.drained) this.controller.abort();
  }
}

/** Listener side: the request body is already buffered, the reply is collected until close. */
export class InboundStream implements IntentStream {
  private readonly written: Buffer[] = [];
  private drained = false;
  private closed = false;

  constructor(
    readonly remotePeerId: string,
    readonly protocolId: string,
    private readonly requestBody: Buffer
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  async read(maxBytes: number): Promise<Uint8Array> {
    if (this.closed) throw new StreamError("stream_closed");
    if (this.drained) return new Uint8Array(0);
    this.drained = true;
    return new Uint8Array(this.requestBody.subarray(0, maxBytes));
  }

  async write(data: Uint8Array): Promise<void> {
    if (this.closed) throw new StreamError("stream_closed");
    this.written.push(Buffer.from(data));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  responseBody(): Buffer {
    return Buffer.concat(this.written);
  }
}
