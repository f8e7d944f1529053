// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { z } from "zod";
import type { SwapParams } from "../common/types.js";

export const PAYMENT_INTENT_TYPE = "stellar_payment";
export const DEFAULT_SWAP_DEADLINE_SECONDS = 1_800;

const baseUnitsSchema = z
  .union([z.string(), z.number()])
  .transform((value) => String(value).trim())
  .pipe(z.string().regex(/^\d+$/, "amount must be a non-negative integer in base units"));

const slippageSchema = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite().nonnegative());

export const swapParamsSchema = z.object({
  from_token: z.string().min(1),
  to_token: z.string().min(1),
  amount: baseUnitsSchema,
  slippage: slippageSchema,
  deadline: z.coerce.number().int().positive().default(DEFAULT_SWAP_DEADLINE_SECONDS)
});

export const paymentIntentSchema = z
  .object({
    xdr: z.string().min(1),
    metadata: z.object({ source: z.string().min(1) }).passthrough(),
    type: z.string().optional(),
    swap_required: z.boolean().optional(),
    // checked after settlement, so a bad swap request never blocks the payment
    swap_params: z.unknown().optional()
  })
  .passthrough();

export type PaymentIntent = z.infer<typeof paymentIntentSchema>;
export type WireSwapParams = z.infer<typeof swapParamsSchema>;

export function toSwapParams(wire: WireSwapParams): SwapParams {
  return {
    fromToken: wire.from_token,
    toToken: wire.to_token,
    amount: wire.amount,
    slippage: wire.slippage,
    deadline: wire.deadline
  };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}
