/**
 * Billing Types
 *
 * Payment transactions, invoices, recurring billing agreements and
 * author royalty records.
 *
 * Rules:
 * - All types are readonly; state changes are new events, never mutation
 * - Timestamps are ISO 8601 UTC strings
 * - Nothing is deleted: cancel and void are terminal states
 */

import type { Money } from "./money.js";

// =============================================================================
// Payment transactions
// =============================================================================

/**
 * Payment channels the engine talks to. `manual` records operator-entered
 * movements such as bank-wired royalty payouts.
 */
export type ProviderId = "card" | "mobile_money_a" | "mobile_money_b" | "manual";

/**
 * The provider's own identifier for a money movement.
 * `(provider, providerTransactionId)` is globally unique in the ledger.
 */
export interface ExternalRef {
  readonly provider: ProviderId;
  readonly providerTransactionId: string;
}

export type TransactionKind = "charge" | "refund" | "payout";

export type TransactionStatus = "pending" | "settled" | "failed" | "reversed";

/** What a transaction pays for. */
export interface SubjectRef {
  readonly type: "invoice" | "subscription" | "royalty";
  readonly id: string;
}

/**
 * A money movement recorded in the ledger. Immutable once committed.
 */
export interface PaymentTransaction {
  readonly id: string;
  readonly externalRef: ExternalRef;
  readonly amount: Money;
  readonly kind: TransactionKind;
  readonly status: TransactionStatus;
  readonly subjectRef: SubjectRef;
  readonly createdAt: string;
  readonly settledAt?: string;
  readonly failureReason?: string;

  /** Attribution and provider extras (authorRef, workRef, revenueType, ...) */
  readonly metadata: Readonly<Record<string, string>>;
}

// =============================================================================
// Invoices
// =============================================================================

export type InvoiceItemType =
  | "subscription"
  | "book_purchase"
  | "premium_upgrade"
  | "tip"
  | "tax"
  | "discount";

export interface InvoiceItem {
  readonly description: string;

  /** Positive integer */
  readonly quantity: number;

  /** Non-negative, except for `discount` items which are ≤ 0 */
  readonly unitPrice: Money;

  readonly itemType: InvoiceItemType;
}

export type InvoiceStatus = "draft" | "issued" | "paid" | "overdue" | "void";

export interface Invoice {
  readonly id: string;
  readonly billingEntity: string;

  /** Gapless per billing entity, starting at 1 */
  readonly sequence: number;

  /** Human-facing number, e.g. "INV-000042" */
  readonly number: string;

  readonly userRef: string;
  readonly items: readonly InvoiceItem[];
  readonly currency: Money["currency"];

  /** Σ quantity × unitPrice over items */
  readonly total: Money;

  readonly status: InvoiceStatus;
  readonly subscriptionId?: string;
  readonly issuedAt: string;
  readonly dueAt: string;
  readonly paidAt?: string;
  readonly voidedAt?: string;
  readonly voidReason?: string;
  readonly paymentTransactionIds: readonly string[];
}

// =============================================================================
// Recurring billing
// =============================================================================

export type BillingFrequency = "monthly" | "quarterly" | "annual";

export type SubscriptionStatus =
  | "active"
  | "renewal_pending"
  | "past_due"
  | "paused"
  | "cancelled";

/** How a subscription is charged. */
export interface PaymentMethod {
  readonly provider: Exclude<ProviderId, "manual">;

  /** Card token or mobile-money account (MSISDN) */
  readonly accountRef: string;
}

export interface RecurringBilling {
  readonly id: string;
  readonly userRef: string;
  readonly planRef: string;
  readonly amount: Money;
  readonly frequency: BillingFrequency;
  readonly status: SubscriptionStatus;
  readonly currentPeriodStart: string;
  readonly currentPeriodEnd: string;

  /** Day of month periods end on; clamped in shorter months */
  readonly anchorDay: number;
  readonly failedAttemptCount: number;
  readonly nextRetryAt?: string;
  readonly paymentMethod: PaymentMethod;

  /** Invoice awaiting payment for the upcoming period */
  readonly outstandingInvoiceId?: string;

  /** Charge reference of an asynchronous charge not yet settled */
  readonly pendingChargeReference?: string;

  readonly invoiceIds: readonly string[];
  readonly createdAt: string;
  readonly cancelledAt?: string;
  readonly cancelReason?: string;
}

// =============================================================================
// Royalties
// =============================================================================

export type RevenueType = "direct_sale" | "subscription_read" | "tip";

/** Half-open time range [start, end). */
export interface Period {
  readonly start: string;
  readonly end: string;
}

export type RoyaltyStatus = "accrued" | "payable" | "paid";

export interface AuthorRoyalty {
  readonly id: string;
  readonly authorRef: string;
  readonly period: Period;
  readonly revenueType: RevenueType;

  /** Σ settled charges − Σ refunds attributed to the author */
  readonly grossBase: Money;

  /** Decimal rate string in [0, 1], e.g. "0.70" */
  readonly rateApplied: string;

  readonly payableAmount: Money;
  readonly status: RoyaltyStatus;
  readonly sourceTransactionRefs: readonly string[];

  /** Set on correction records */
  readonly correctsRoyaltyId?: string;
  readonly correctionReason?: string;

  readonly computedAt: string;
  readonly paidAt?: string;
  readonly payoutTransactionId?: string;
}
