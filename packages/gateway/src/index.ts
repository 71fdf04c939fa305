/**
 * @quire/gateway — Payment Gateway Abstraction.
 *
 * Provides:
 * - PaymentProvider contract and the card / mobile-money adapters
 * - WebhookIngestor: verify → normalize → ledger → effects
 * - ChargeExecutor: provider charge with retry, outcome recorded in the ledger
 * - withRetry for transient provider failures
 *
 * @packageDocumentation
 */

export type {
  ChargeRequest,
  ChargeOutcome,
  DeclineReason,
  NormalizedPaymentEvent,
  PaymentProvider,
  PaymentEffectHandler,
  WebhookIngestStatus,
  WebhookIngestResult,
} from "./types.js";

export { chargeReference, parseChargeReference } from "./reference.js";

export { ProviderHttpClient } from "./http.js";
export type { FetchFn, ProviderHttpConfig, ProviderResponse } from "./http.js";

export type { RetryConfig } from "./retry.js";
export {
  DEFAULT_RETRY_CONFIG,
  RetryExhaustedError,
  computeDelay,
  withRetry,
  isTransientProviderError,
} from "./retry.js";

export { CardProvider, signCardPayload } from "./providers/card.js";
export type { CardProviderOptions } from "./providers/card.js";
export { MobileMoneyAProvider } from "./providers/mobile-money-a.js";
export type { MobileMoneyAProviderOptions } from "./providers/mobile-money-a.js";
export { MobileMoneyBProvider } from "./providers/mobile-money-b.js";
export type { MobileMoneyBProviderOptions } from "./providers/mobile-money-b.js";
export { classifyDecline } from "./providers/common.js";

export { ProviderRegistry } from "./registry.js";
export { WebhookIngestor } from "./webhook-ingestor.js";
export type { WebhookIngestorOptions } from "./webhook-ingestor.js";
export { ChargeExecutor } from "./charge-executor.js";
export type { ChargeExecutorOptions, ChargeResult } from "./charge-executor.js";
