/**
 * @quire/gateway — Provider contract.
 *
 * Every payment channel, whatever its wire format, is reduced to the same
 * capability set: start a charge, look one up, authenticate a webhook and
 * turn a webhook into a NormalizedPaymentEvent. Nothing above this layer
 * knows about HMAC headers or major-unit strings.
 */

import type {
  Money,
  PaymentMethod,
  PaymentTransaction,
  ProviderId,
  SubjectRef,
  TransactionKind,
  TransactionStatus,
} from "@quire/types";

// =============================================================================
// Charges
// =============================================================================

export interface ChargeRequest {
  /**
   * Merchant reference, unique per attempt (`<invoiceId>:<attempt>`).
   * Sent as the provider's idempotency key and echoed back in webhooks.
   */
  readonly reference: string;
  readonly amount: Money;
  readonly paymentMethod: PaymentMethod;
  readonly subjectRef: SubjectRef;
  readonly description?: string;
  readonly metadata?: Readonly<Record<string, string>>;
}

/** Decline reasons providers report for a permanent charge failure. */
export type DeclineReason = "insufficient_funds" | "invalid_account" | "fraud_block" | "declined";

export interface ChargeOutcome {
  readonly status: "settled" | "pending" | "failed";

  /** Absent when the provider declined before assigning an id */
  readonly providerTransactionId?: string;
  readonly failureReason?: DeclineReason;
}

// =============================================================================
// Webhooks
// =============================================================================

/**
 * A provider notification in engine terms. Amounts are already converted
 * to minor units; statuses to the ledger's vocabulary.
 */
export interface NormalizedPaymentEvent {
  readonly provider: ProviderId;
  readonly providerTransactionId: string;
  readonly kind: TransactionKind;
  readonly status: TransactionStatus;
  readonly amount: Money;
  readonly reference: string;
  readonly occurredAt: string;
  readonly failureReason?: string;
  readonly metadata: Readonly<Record<string, string>>;
}

export interface PaymentProvider {
  readonly id: Exclude<ProviderId, "manual">;

  /**
   * @throws ProviderError transient on timeout, network error or 5xx;
   *         permanent on a 4xx that is not a decline
   */
  initiateCharge(request: ChargeRequest): Promise<ChargeOutcome>;

  /** The provider's view of a charge, or null if it never saw the reference. */
  getChargeStatus(reference: string): Promise<ChargeOutcome | null>;

  /** @throws UnauthenticatedWebhookError */
  verifyWebhookSignature(rawPayload: string, signatureHeader: string | undefined): void;

  /**
   * @returns null for notifications the engine does not act on
   * @throws ValidationError for malformed payloads
   */
  normalizeWebhookPayload(rawPayload: string): NormalizedPaymentEvent | null;
}

// =============================================================================
// Effects
// =============================================================================

/**
 * Reaction to a newly recorded transaction (invoice paid, renewal
 * settled). Runs once per inserted row, never for duplicates.
 */
export type PaymentEffectHandler = (transaction: PaymentTransaction) => void | Promise<void>;

export type WebhookIngestStatus = "accepted" | "duplicate" | "ignored";

export interface WebhookIngestResult {
  readonly status: WebhookIngestStatus;
  readonly transaction?: PaymentTransaction;
}
