// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

const MAX_BUFFERED_MESSAGES = 1_000;

/**
 * Unbounded stream of messages for one topic. Only messages that arrive
 * after the subscription was created are delivered; iteration ends when the
 * subscription is closed (explicitly, by its abort signal, or by host stop).
 * Single consumer.
 */
export class Subscription implements AsyncIterable<Uint8Array> {
  private readonly buffer: Uint8Array[] = [];
  private waiting: ((result: IteratorResult<Uint8Array>) => void) | undefined;
  private closed = false;

  constructor(
    readonly topic: string,
    private readonly onClose: (subscription: Subscription) => void,
    signal?: AbortSignal
  ) {
    if (signal?.aborted) {
      this.close();
    } else {
      signal?.addEventListener("abort", () => this.close(), { once: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(data: Uint8Array): void {
    if (this.closed) return;
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = undefined;
      waiting({ done: false, value: data });
      return;
    }
    this.buffer.push(data);
    if (this.buffer.length > MAX_BUFFERED_MESSAGES) this.buffer.shift();
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.buffer.length = 0;
    const waiting = this.waiting;
    this.waiting = undefined;
    waiting?.({ done: true, value: undefined });
    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    return {
      next: () => {
        const next = this.buffer.shift();
        if (next !== undefined) return Promise.resolve({ done: false, value: next });
        if (this.closed) return Promise.resolve({ done: true, value: undefined });
        return new Promise((resolve) => {
          this.waiting = resolve;
        });
      },
      return: () => {
        this.close();
        return Promise.resolve({ done: true, value: undefined });
      }
    };
  }
}
