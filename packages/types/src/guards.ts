/**
 * Runtime type guards for system boundaries.
 *
 * Used where data re-enters the process untyped: JSONL files on load,
 * webhook bodies, HTTP payloads.
 */

import type { Currency, Money } from "./money.js";
import { SUPPORTED_CURRENCIES } from "./money.js";
import type {
  PaymentTransaction,
  ProviderId,
  TransactionKind,
  TransactionStatus,
} from "./billing.js";
import type { DomainEvent, EventMetadata } from "./event.js";

// =============================================================================
// Money guards
// =============================================================================

const CURRENCIES = new Set<string>(SUPPORTED_CURRENCIES);
const MINOR_AMOUNT = /^-?\d+$/;

export function isCurrency(value: unknown): value is Currency {
  return typeof value === "string" && CURRENCIES.has(value);
}

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.amountMinor === "string" &&
    MINOR_AMOUNT.test(v.amountMinor) &&
    isCurrency(v.currency)
  );
}

// =============================================================================
// Transaction guards
// =============================================================================

const PROVIDERS = new Set<string>(["card", "mobile_money_a", "mobile_money_b", "manual"]);
const KINDS = new Set<string>(["charge", "refund", "payout"]);
const STATUSES = new Set<string>(["pending", "settled", "failed", "reversed"]);
const SUBJECT_TYPES = new Set<string>(["invoice", "subscription", "royalty"]);

export function isProviderId(value: unknown): value is ProviderId {
  return typeof value === "string" && PROVIDERS.has(value);
}

export function isTransactionKind(value: unknown): value is TransactionKind {
  return typeof value === "string" && KINDS.has(value);
}

export function isTransactionStatus(value: unknown): value is TransactionStatus {
  return typeof value === "string" && STATUSES.has(value);
}

export function isPaymentTransaction(value: unknown): value is PaymentTransaction {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  const ref = v.externalRef as Record<string, unknown> | null | undefined;
  const subject = v.subjectRef as Record<string, unknown> | null | undefined;
  return (
    typeof v.id === "string" &&
    typeof ref === "object" &&
    ref !== null &&
    isProviderId(ref.provider) &&
    typeof ref.providerTransactionId === "string" &&
    isMoney(v.amount) &&
    isTransactionKind(v.kind) &&
    isTransactionStatus(v.status) &&
    typeof subject === "object" &&
    subject !== null &&
    typeof subject.type === "string" &&
    SUBJECT_TYPES.has(subject.type) &&
    typeof subject.id === "string" &&
    typeof v.createdAt === "string" &&
    typeof v.metadata === "object" &&
    v.metadata !== null
  );
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>([
  "ledger",
  "gateway",
  "invoicing",
  "subscriptions",
  "royalties",
  "config",
]);

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    typeof v.source === "string" &&
    EVENT_SOURCES.has(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
