import { describe, expect, it, vi } from "vitest";
import { Subscription } from "../../src/mesh/subscription.js";

const bytes = (n: number) => new Uint8Array([n]);

describe("Subscription", () => {
  it("delivers buffered and later messages in order", async () => {
    const sub = new Subscription("t", () => undefined);
    sub.push(bytes(1));
    const received: number[] = [];
    const consuming = (async () => {
      for await (const data of sub) {
        received.push(data[0]);
        if (received.length === 3) break;
      }
    })();
    sub.push(bytes(2));
    sub.push(bytes(3));
    await consuming;
    expect(received).toEqual([1, 2, 3]);
    expect(sub.isClosed).toBe(true);
  });

  it("ends iteration when the signal aborts", async () => {
    const controller = new AbortController();
    const onClose = vi.fn();
    const sub = new Subscription("t", onClose, controller.signal);
    const consuming = (async () => {
      let count = 0;
      for await (const _ of sub) count += 1;
      return count;
    })();
    controller.abort();
    expect(await consuming).toBe(0);
    expect(onClose).toHaveBeenCalledWith(sub);
  });

  it("starts closed when the signal already aborted", () => {
    const controller = new AbortController();
    controller.abort();
    expect(new Subscription("t", () => undefined, controller.signal).isClosed).toBe(true);
  });

  it("drops the oldest messages past one thousand", async () => {
    const sub = new Subscription("t", () => undefined);
    for (let i = 0; i < 1_001; i++) sub.push(new Uint8Array([i % 256, Math.floor(i / 256)]));
    const iterator = sub[Symbol.asyncIterator]();
    const first = await iterator.next();
    expect(first.value).toEqual(new Uint8Array([1, 0]));
  });

  it("ignores pushes after close", async () => {
    const sub = new Subscription("t", () => undefined);
    sub.close();
    sub.push(bytes(1));
    expect(await sub[Symbol.asyncIterator]().next()).toEqual({ done: true, value: undefined });
  });
});
