// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import {
  FeeBumpTransaction,
  Horizon,
  Keypair,
  StrKey,
  TransactionBuilder,
  type Transaction
} from "@stellar/stellar-sdk";
import { z } from "zod";
import { MalformedPayloadError, SettlementError, ValidationFailureError } from "../common/errors.js";
import { createLogger, errorMessage } from "../common/logger.js";
import { err, ok, type Result } from "../common/result.js";

const logger = createLogger("ledger");

/** The parts of a decoded envelope the validator and orchestrator look at. */
export interface ParsedEnvelope {
  xdr: string;
  /** Hex transaction hash for the configured network. */
  hash: string;
  source: string;
  sequence: string;
  signatureCount: number;
  feeBump: boolean;
}

export interface LedgerSubmission {
  hash: string;
  ledger: number;
}

export interface LedgerAccount {
  accountId: string;
  sequence: string;
}

export interface LedgerClient {
  parseEnvelope(xdr: string): Result<ParsedEnvelope, MalformedPayloadError>;
  verifyEnvelope(envelope: ParsedEnvelope): Result<true, ValidationFailureError>;
  submitTransaction(envelope: ParsedEnvelope): Promise<Result<LedgerSubmission, SettlementError>>;
  loadAccount(accountId: string): Promise<Result<LedgerAccount, SettlementError>>;
}

export interface StellarLedgerOptions {
  horizonUrl: string;
  networkPassphrase: string;
  server?: HorizonGateway;
}

// Horizon rejections carry the problem document on `response`.
const horizonErrorSchema = z.object({
  response: z.object({
    status: z.number().optional(),
    title: z.string().optional(),
    extras: z.object({ result_codes: z.unknown().optional() }).optional()
  })
});

function describeHorizonError(error: unknown): string {
  const parsed = horizonErrorSchema.safeParse(error);
  if (!parsed.success) return errorMessage(error);
  const { status, title, extras } = parsed.data.response;
  const codes = extras?.result_codes;
  const detail = codes === undefined ? "" : ` ${JSON.stringify(codes)}`;
  return `horizon_${status ?? "error"}: ${title ?? errorMessage(error)}${detail}`;
}

/** The subset of `Horizon.Server` the client calls. */
export interface HorizonGateway {
  submitTransaction(tx: Transaction | FeeBumpTransaction): Promise<{ hash: string; ledger: number }>;
  loadAccount(accountId: string): Promise<{ accountId(): string; sequenceNumber(): string }>;
}

export class StellarLedgerClient implements LedgerClient {
  private readonly server: HorizonGateway;

  constructor(private readonly options: StellarLedgerOptions) {
    this.server =
      options.server ??
      new Horizon.Server(options.horizonUrl, { allowHttp: options.horizonUrl.startsWith("http://") });
  }

  parseEnvelope(xdr: string): Result<ParsedEnvelope, MalformedPayloadError> {
    try {
      const tx = this.decode(xdr);
      const inner = tx instanceof FeeBumpTransaction ? tx.innerTransaction : tx;
      return ok({
        xdr,
        hash: tx.hash().toString("hex"),
        source: tx instanceof FeeBumpTransaction ? tx.feeSource : tx.source,
        sequence: inner.sequence,
        signatureCount: tx.signatures.length,
        feeBump: tx instanceof FeeBumpTransaction
      });
    } catch (error) {
      return err(new MalformedPayloadError(`envelope_parse_failed: ${errorMessage(error)}`));
    }
  }

  /**
   * Every attached signature must be an ed25519 signature over the
   * transaction hash by one of the accounts named in the transaction whose
   * hint matches.
   */
  verifyEnvelope(envelope: ParsedEnvelope): Result<true, ValidationFailureError> {
    let tx: Transaction | FeeBumpTransaction;
    try {
      tx = this.decode(envelope.xdr);
    } catch (error) {
      return err(new ValidationFailureError(`envelope_parse_failed: ${errorMessage(error)}`));
    }
    const hash = tx.hash();
    const signers = candidateSigners(tx);
    for (const [index, decorated] of tx.signatures.entries()) {
      const hint = decorated.hint();
      const signature = decorated.signature();
      const matched = signers.some((kp) => kp.signatureHint().equals(hint) && kp.verify(hash, signature));
      if (!matched) {
        return err(new ValidationFailureError(`signature ${index} does not verify against any transaction account`));
      }
    }
    return ok(true);
  }

  async submitTransaction(envelope: ParsedEnvelope): Promise<Result<LedgerSubmission, SettlementError>> {
    try {
      logger.info("submitting transaction", { hash: envelope.hash, source: envelope.source });
      const response = await this.server.submitTransaction(this.decode(envelope.xdr));
      logger.info("transaction accepted", { hash: response.hash, ledger: response.ledger });
      return ok({ hash: response.hash, ledger: response.ledger });
    } catch (error) {
      const reason = describeHorizonError(error);
      logger.error("submission failed", { hash: envelope.hash, reason });
      return err(new SettlementError(reason));
    }
  }

  async loadAccount(accountId: string): Promise<Result<LedgerAccount, SettlementError>> {
    try {
      const account = await this.server.loadAccount(accountId);
      return ok({ accountId: account.accountId(), sequence: account.sequenceNumber() });
    } catch (error) {
      return err(new SettlementError(describeHorizonError(error)));
    }
  }

  private decode(xdr: string): Transaction | FeeBumpTransaction {
    return TransactionBuilder.fromXDR(xdr, this.options.networkPassphrase);
  }
}

function candidateSigners(tx: Transaction | FeeBumpTransaction): Keypair[] {
  const accounts =
    tx instanceof FeeBumpTransaction
      ? [tx.feeSource]
      : [tx.source, ...tx.operations.map((operation) => operation.source)];
  const unique = new Set(
    accounts.filter((account): account is string => typeof account === "string" && StrKey.isValidEd25519PublicKey(account))
  );
  return [...unique].map((account) => Keypair.fromPublicKey(account));
}
