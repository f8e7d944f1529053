import { describe, expect, it, vi } from "vitest";
import type { SettlementOutcome, ValidationResult } from "../../src/common/types.js";
import { encodeMessage } from "../../src/intent/protocol.js";
import { createIntentHandler, processIntent, type IntentResponderDeps } from "../../src/intent/responder.js";
import type { PaymentIntent } from "../../src/intent/schema.js";
import { InboundStream } from "../../src/mesh/stream.js";

const settled: SettlementOutcome = { stellar: { status: "SUCCESS", tx_hash: "txhash", ledger: 12 } };

function deps(overrides: Partial<IntentResponderDeps> = {}): IntentResponderDeps {
  return {
    validate: vi.fn((): ValidationResult => ({ verdict: "valid" })),
    orchestrator: { settle: vi.fn(async (_intent: PaymentIntent) => settled) },
    role: "swap_coordinator",
    ...overrides
  };
}

const validIntent = { type: "stellar_payment", xdr: "AAAA", metadata: { source: "payer" } };

function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

describe("processIntent", () => {
  it("settles a valid payment intent", async () => {
    const d = deps();
    const response = await processIntent(encodeMessage(validIntent), d);
    expect(response).toEqual({ status: "PROCESSED", results: settled });
    expect(d.orchestrator.settle).toHaveBeenCalledTimes(1);
  });

  it("answers ERROR for bytes that are not JSON", async () => {
    const response = await processIntent(bytes("{not json"), deps());
    expect(response.status).toBe("ERROR");
    if (response.status !== "ERROR") return;
    expect(response.reason).toMatch(/^Invalid JSON: /);
  });

  it("answers ERROR for JSON that is not an object", async () => {
    expect(await processIntent(bytes("[1,2,3]"), deps())).toEqual({
      status: "ERROR",
      reason: "Invalid intent: payload must be a JSON object"
    });
  });

  it("answers ERROR when the envelope is missing, whatever the type", async () => {
    const d = deps();
    expect(await processIntent(encodeMessage({ type: "stellar_payment", metadata: { source: "p" } }), d)).toEqual({
      status: "ERROR",
      reason: "No XDR provided"
    });
    expect(await processIntent(encodeMessage({ type: "something_else", xdr: "" }), d)).toEqual({
      status: "ERROR",
      reason: "No XDR provided"
    });
    expect(d.validate).not.toHaveBeenCalled();
  });

  it("does not handle other intent types", async () => {
    const d = deps();
    expect(await processIntent(encodeMessage({ ...validIntent, type: "oracle_report" }), d)).toEqual({
      status: "UNSUPPORTED_INTENT_TYPE"
    });
    expect(await processIntent(encodeMessage({ xdr: "AAAA", metadata: { source: "p" } }), d)).toEqual({
      status: "UNSUPPORTED_INTENT_TYPE"
    });
    expect(d.orchestrator.settle).not.toHaveBeenCalled();
  });

  it("does not settle unless running as swap coordinator", async () => {
    const d = deps({ role: "payer" });
    expect(await processIntent(encodeMessage(validIntent), d)).toEqual({ status: "UNSUPPORTED_INTENT_TYPE" });
  });

  it("reports schema problems", async () => {
    const response = await processIntent(encodeMessage({ type: "stellar_payment", xdr: "AAAA" }), deps());
    expect(response).toEqual({ status: "ERROR", reason: "Invalid intent: metadata: Required" });
  });

  it("rejects invalid envelopes without settling", async () => {
    const d = deps({ validate: vi.fn((): ValidationResult => ({ verdict: "invalid", reason: "No signatures present" })) });
    expect(await processIntent(encodeMessage(validIntent), d)).toEqual({
      status: "INVALID",
      reason: "No signatures present"
    });
    expect(d.orchestrator.settle).not.toHaveBeenCalled();
  });

  it("rejects malformed envelopes without settling", async () => {
    const d = deps({ validate: () => ({ verdict: "malformed", reason: "envelope_parse_failed: bad" }) });
    expect(await processIntent(encodeMessage(validIntent), d)).toEqual({
      status: "INVALID",
      reason: "envelope_parse_failed: bad"
    });
    expect(d.orchestrator.settle).not.toHaveBeenCalled();
  });

  it("keeps unknown keys on the intent handed to settlement", async () => {
    const d = deps();
    await processIntent(encodeMessage({ ...validIntent, memo: "invoice 7" }), d);
    expect(d.orchestrator.settle).toHaveBeenCalledWith(expect.objectContaining({ memo: "invoice 7" }));
  });

  it("settles when unused swap parameters do not describe a swap", async () => {
    const d = deps();
    const response = await processIntent(
      encodeMessage({ ...validIntent, swap_required: false, swap_params: { note: "unused" } }),
      d
    );
    expect(response).toEqual({ status: "PROCESSED", results: settled });
    expect(d.orchestrator.settle).toHaveBeenCalledTimes(1);
  });

  it("leaves unusable swap parameters to settlement", async () => {
    const d = deps();
    const swapParams = { from_token: "0xaaa", to_token: "0xbbb", amount: "1.5", slippage: 1 };
    const response = await processIntent(encodeMessage({ ...validIntent, swap_required: true, swap_params: swapParams }), d);
    expect(response).toEqual({ status: "PROCESSED", results: settled });
    expect(d.orchestrator.settle).toHaveBeenCalledWith(expect.objectContaining({ swap_params: swapParams }));
  });
});

describe("createIntentHandler", () => {
  function decode(stream: InboundStream): unknown {
    return JSON.parse(stream.responseBody().toString("utf8"));
  }

  it("writes the response and closes the stream", async () => {
    const stream = new InboundStream("QmPeer", "/stellar/coordination/1.0.0", Buffer.from(JSON.stringify(validIntent)));
    await createIntentHandler(deps())(stream);
    expect(decode(stream)).toEqual({ status: "PROCESSED", results: settled });
    expect(stream.isClosed).toBe(true);
  });

  it("answers ERROR when settlement throws", async () => {
    const d = deps({
      orchestrator: {
        settle: async () => {
          throw new Error("ledger offline");
        }
      }
    });
    const stream = new InboundStream("QmPeer", "/stellar/coordination/1.0.0", Buffer.from(JSON.stringify(validIntent)));
    await createIntentHandler(d)(stream);
    expect(decode(stream)).toEqual({ status: "ERROR", reason: "ledger offline" });
    expect(stream.isClosed).toBe(true);
  });

  it("reads at most 16384 bytes of the request", async () => {
    const padded = JSON.stringify({ ...validIntent, padding: "x".repeat(20_000) });
    const stream = new InboundStream("QmPeer", "/stellar/coordination/1.0.0", Buffer.from(padded));
    await createIntentHandler(deps())(stream);
    const response = decode(stream);
    expect(response).toMatchObject({ status: "ERROR" });
  });
});
