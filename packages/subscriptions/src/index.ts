/**
 * @quire/subscriptions — Recurring Billing Orchestrator.
 *
 * Renewal invoices and charges at each period boundary, dunning with a
 * configured retry schedule, pause/resume/cancel. Event-sourced, one
 * keyed lock per subscription.
 *
 * @packageDocumentation
 */

export { SubscriptionOrchestrator, CreateSubscriptionInputSchema, DUNNING_EXHAUSTED } from "./orchestrator.js";
export type { SubscriptionOrchestratorOptions, CreateSubscriptionInput } from "./orchestrator.js";

export {
  SUBSCRIPTION_CREATED,
  SUBSCRIPTION_RENEWAL_STARTED,
  SUBSCRIPTION_CHARGE_ATTEMPTED,
  SUBSCRIPTION_RENEWED,
  SUBSCRIPTION_CHARGE_FAILED,
  SUBSCRIPTION_CHARGE_RELEASED,
  SUBSCRIPTION_PAUSED,
  SUBSCRIPTION_RESUMED,
  SUBSCRIPTION_CANCELLED,
  SUBSCRIPTION_EVENT_SCHEMAS,
  subscriptionStream,
} from "./events.js";

export { applySubscriptionEvent } from "./projection.js";
export { addMonths, addDays, periodEnd } from "./periods.js";
