/**
 * @quire/types — Shared domain types for the Quire billing engine.
 *
 * These types are used across all Quire packages:
 * - Money in integer minor units
 * - Payment transactions, invoices, subscriptions, royalties
 * - Event architecture
 * - Error taxonomy
 * - Injectable clock
 *
 * - Zod schemas for the same shapes, for parsing untrusted input
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No methods that mutate state
 */

// Money
export type { Currency, Money, RoundingMode } from "./money.js";
export { SUPPORTED_CURRENCIES, CURRENCY_EXPONENTS } from "./money.js";

// Billing types
export type {
  ProviderId,
  ExternalRef,
  TransactionKind,
  TransactionStatus,
  SubjectRef,
  PaymentTransaction,
  InvoiceItemType,
  InvoiceItem,
  InvoiceStatus,
  Invoice,
  BillingFrequency,
  SubscriptionStatus,
  PaymentMethod,
  RecurringBilling,
  RevenueType,
  Period,
  RoyaltyStatus,
  AuthorRoyalty,
} from "./billing.js";

// Event types
export type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// Errors
export type { BillingErrorCode } from "./errors.js";
export {
  BillingError,
  ValidationError,
  UnauthenticatedWebhookError,
  ProviderError,
  ConfigMissingError,
  ImmutablePeriodError,
  SequenceConflictError,
  NotFoundError,
  InvalidTransitionError,
} from "./errors.js";

// Clock
export type { Clock } from "./clock.js";
export { systemClock, ManualClock } from "./clock.js";

// Runtime type guards
export {
  isCurrency,
  isMoney,
  isProviderId,
  isTransactionKind,
  isTransactionStatus,
  isPaymentTransaction,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";

// Schemas
export {
  CurrencySchema,
  MinorAmountSchema,
  MoneySchema,
  RateSchema,
  RoundingModeSchema,
  IsoDateSchema,
  PeriodSchema,
  InvoiceItemSchema,
  PaymentMethodSchema,
  RevenueTypeSchema,
} from "./schemas.js";
