/**
 * Subscription state as a fold over its events.
 */

import type { DomainEvent, RecurringBilling } from "@quire/types";
import { ValidationError } from "@quire/types";
import {
  CancelledPayloadSchema,
  ChargeAttemptedPayloadSchema,
  ChargeFailedPayloadSchema,
  ChargeReleasedPayloadSchema,
  PausedPayloadSchema,
  RenewalStartedPayloadSchema,
  RenewedPayloadSchema,
  ResumedPayloadSchema,
  SUBSCRIPTION_CANCELLED,
  SUBSCRIPTION_CHARGE_ATTEMPTED,
  SUBSCRIPTION_CHARGE_FAILED,
  SUBSCRIPTION_CHARGE_RELEASED,
  SUBSCRIPTION_CREATED,
  SUBSCRIPTION_PAUSED,
  SUBSCRIPTION_RENEWAL_STARTED,
  SUBSCRIPTION_RENEWED,
  SUBSCRIPTION_RESUMED,
  SubscriptionCreatedPayloadSchema,
} from "./events.js";

export const SUBSCRIPTION_EVENT_TYPES: ReadonlySet<string> = new Set([
  SUBSCRIPTION_CREATED,
  SUBSCRIPTION_RENEWAL_STARTED,
  SUBSCRIPTION_CHARGE_ATTEMPTED,
  SUBSCRIPTION_RENEWED,
  SUBSCRIPTION_CHARGE_FAILED,
  SUBSCRIPTION_CHARGE_RELEASED,
  SUBSCRIPTION_PAUSED,
  SUBSCRIPTION_RESUMED,
  SUBSCRIPTION_CANCELLED,
]);

/**
 * Apply one subscription event. `current` is undefined only for
 * `subscription.created`.
 */
export function applySubscriptionEvent(
  current: RecurringBilling | undefined,
  event: DomainEvent,
): RecurringBilling {
  if (event.type === SUBSCRIPTION_CREATED) {
    const p = SubscriptionCreatedPayloadSchema.parse(event.payload);
    return { ...p, status: "active", failedAttemptCount: 0, invoiceIds: [] };
  }

  if (current === undefined) {
    throw new ValidationError(`"${event.type}" event for a subscription that was never created`);
  }

  switch (event.type) {
    case SUBSCRIPTION_RENEWAL_STARTED: {
      const p = RenewalStartedPayloadSchema.parse(event.payload);
      return {
        ...current,
        status: "renewal_pending",
        outstandingInvoiceId: p.invoiceId,
        invoiceIds: current.invoiceIds.includes(p.invoiceId)
          ? current.invoiceIds
          : [...current.invoiceIds, p.invoiceId],
      };
    }

    case SUBSCRIPTION_CHARGE_ATTEMPTED: {
      const p = ChargeAttemptedPayloadSchema.parse(event.payload);
      return { ...current, pendingChargeReference: p.reference };
    }

    case SUBSCRIPTION_RENEWED: {
      const p = RenewedPayloadSchema.parse(event.payload);
      // A late settlement advances the period without reviving the subscription
      const keep = current.status === "paused" || current.status === "cancelled";
      return {
        ...current,
        status: keep ? current.status : "active",
        currentPeriodStart: p.periodStart,
        currentPeriodEnd: p.periodEnd,
        failedAttemptCount: 0,
        nextRetryAt: undefined,
        outstandingInvoiceId: undefined,
        pendingChargeReference: undefined,
      };
    }

    case SUBSCRIPTION_CHARGE_FAILED: {
      const p = ChargeFailedPayloadSchema.parse(event.payload);
      return {
        ...current,
        status: "past_due",
        failedAttemptCount: p.failedAttemptCount,
        nextRetryAt: p.nextRetryAt,
        pendingChargeReference: p.chargeInFlight,
      };
    }

    case SUBSCRIPTION_CHARGE_RELEASED:
      ChargeReleasedPayloadSchema.parse(event.payload);
      return { ...current, pendingChargeReference: undefined };

    case SUBSCRIPTION_PAUSED:
      PausedPayloadSchema.parse(event.payload);
      return { ...current, status: "paused" };

    case SUBSCRIPTION_RESUMED:
      ResumedPayloadSchema.parse(event.payload);
      return { ...current, status: "active" };

    case SUBSCRIPTION_CANCELLED: {
      const p = CancelledPayloadSchema.parse(event.payload);
      return { ...current, status: "cancelled", cancelledAt: p.cancelledAt, cancelReason: p.reason };
    }

    default:
      throw new ValidationError(`Unknown subscription event "${event.type}"`);
  }
}

/** The subscription id a subscription event belongs to. */
export function subscriptionIdOf(event: DomainEvent): string {
  if (event.type === SUBSCRIPTION_CREATED) {
    return SubscriptionCreatedPayloadSchema.parse(event.payload).id;
  }
  const id = event.payload["subscriptionId"];
  if (typeof id !== "string") {
    throw new ValidationError(`"${event.type}" event carries no subscriptionId`);
  }
  return id;
}
