// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { request } from "undici";
import { z } from "zod";
import { SwapQuoteError } from "../common/errors.js";
import { createLogger, errorMessage } from "../common/logger.js";
import { err, ok, type Result } from "../common/result.js";
import type { SwapParams } from "../common/types.js";

const logger = createLogger("swap");

const DEFAULT_TIMEOUT_MS = 15_000;

export interface SwapQuote {
  /** Provider response as returned. */
  raw: Record<string, unknown>;
  tx: { to: string; data: string; value: string };
}

export interface SwapQuoteClient {
  getQuote(params: SwapParams): Promise<Result<SwapQuote, SwapQuoteError>>;
}

export interface OneInchOptions {
  baseUrl: string;
  apiKey?: string;
  /** Wallet the swap transaction is built for. */
  fromAddress?: string;
  timeoutMs?: number;
}

const swapResponseSchema = z
  .object({
    tx: z
      .object({
        to: z.string(),
        data: z.string(),
        value: z.union([z.string(), z.number()]).transform(String)
      })
      .passthrough()
  })
  .passthrough();

export class OneInchQuoteClient implements SwapQuoteClient {
  constructor(private readonly options: OneInchOptions) {}

  async getQuote(params: SwapParams): Promise<Result<SwapQuote, SwapQuoteError>> {
    if (!this.options.apiKey) {
      return err(new SwapQuoteError("oneinch_api_key_missing: set ONEINCH_API_KEY"));
    }
    const query = new URLSearchParams({
      src: params.fromToken,
      dst: params.toToken,
      amount: params.amount,
      slippage: String(params.slippage)
    });
    if (this.options.fromAddress) query.set("from", this.options.fromAddress);

    try {
      logger.info("fetching swap quote", { src: params.fromToken, dst: params.toToken, amount: params.amount });
      const res = await request(`${this.options.baseUrl}/swap?${query.toString()}`, {
        method: "GET",
        headers: {
          authorization: `Bearer ${this.options.apiKey}`,
          accept: "application/json"
        },
        signal: AbortSignal.timeout(this.options.timeoutMs ?? DEFAULT_TIMEOUT_MS)
      });
      if (res.statusCode < 200 || res.statusCode >= 300) {
        const body = await res.body.text().catch(() => "");
        logger.error("swap quote rejected", { statusCode: res.statusCode });
        return err(new SwapQuoteError(`oneinch_http_${res.statusCode}: ${body.slice(0, 200)}`));
      }
      const parsed = swapResponseSchema.safeParse(await res.body.json());
      if (!parsed.success) {
        return err(new SwapQuoteError("oneinch_missing_tx: response carries no tx.to/data/value"));
      }
      const { to, data, value } = parsed.data.tx;
      return ok({ raw: parsed.data, tx: { to, data, value } });
    } catch (error) {
      logger.error("swap quote failed", { error: errorMessage(error) });
      return err(new SwapQuoteError(`oneinch_request_failed: ${errorMessage(error)}`));
    }
  }
}
