import {
  Account,
  Asset,
  BASE_FEE,
  Keypair,
  Networks,
  Operation,
  TransactionBuilder,
  type Transaction
} from "@stellar/stellar-sdk";

export const TEST_PASSPHRASE = Networks.TESTNET;

export interface BuiltPayment {
  tx: Transaction;
  source: Keypair;
  destination: Keypair;
}

/**
 * A one-operation native payment. The account sequence given here is the
 * current one; the built transaction uses the next value.
 */
export function buildPayment(accountSequence = "4", passphrase: string = TEST_PASSPHRASE): BuiltPayment {
  const source = Keypair.random();
  const destination = Keypair.random();
  const tx = new TransactionBuilder(new Account(source.publicKey(), accountSequence), {
    fee: BASE_FEE,
    networkPassphrase: passphrase
  })
    .addOperation(Operation.payment({ destination: destination.publicKey(), asset: Asset.native(), amount: "10" }))
    .setTimeout(30)
    .build();
  return { tx, source, destination };
}

export function signedPaymentXdr(accountSequence = "4"): string {
  const { tx, source } = buildPayment(accountSequence);
  tx.sign(source);
  return tx.toXDR();
}

export function paymentIntent(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    type: "stellar_payment",
    xdr: signedPaymentXdr(),
    metadata: { source: "payer-agent" },
    ...overrides
  };
}
