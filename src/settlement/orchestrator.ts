// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createLogger } from "../common/logger.js";
import type { SettlementOutcome, SwapOutcome } from "../common/types.js";
import { formatIssues, swapParamsSchema, toSwapParams, type PaymentIntent } from "../intent/schema.js";
import type { LedgerClient } from "../ledger/stellar.js";
import type { SwapQuoteClient } from "../swap/oneinch.js";

const logger = createLogger("settlement");

type SettledOutcome = Extract<SettlementOutcome, { stellar: unknown }>;

/** Gas limit attached to every swap transaction handed back to the initiator. */
export const SWAP_GAS_ESTIMATE = 300_000;

export class SettlementOrchestrator {
  constructor(
    private readonly ledger: Pick<LedgerClient, "parseEnvelope" | "submitTransaction">,
    private readonly swap: SwapQuoteClient
  ) {}

  async settle(intent: PaymentIntent): Promise<SettlementOutcome> {
    const parsed = this.ledger.parseEnvelope(intent.xdr);
    if (!parsed.ok) {
      return { status: "ERROR", reason: parsed.error.message };
    }
    const submitted = await this.ledger.submitTransaction(parsed.value);
    if (!submitted.ok) {
      return { status: "ERROR", reason: submitted.error.message };
    }

    const outcome: SettledOutcome = {
      stellar: { status: "SUCCESS", tx_hash: submitted.value.hash, ledger: submitted.value.ledger }
    };
    if (intent.swap_required === true) {
      outcome.swap = await this.quoteSwap(intent);
    }
    return outcome;
  }

  private async quoteSwap(intent: PaymentIntent): Promise<SwapOutcome> {
    if (intent.swap_params === undefined || intent.swap_params === null) {
      return { status: "ERROR", reason: "swap_params missing" };
    }
    const params = swapParamsSchema.safeParse(intent.swap_params);
    if (!params.success) {
      return { status: "ERROR", reason: `Invalid swap_params: ${formatIssues(params.error)}` };
    }
    const quote = await this.swap.getQuote(toSwapParams(params.data));
    if (!quote.ok) {
      logger.warn("swap quote unavailable", { reason: quote.error.message });
      return { status: "ERROR", reason: quote.error.message };
    }
    return {
      status: "SWAP_READY",
      quote: quote.value.raw,
      tx: { ...quote.value.tx, gas: SWAP_GAS_ESTIMATE }
    };
  }
}
