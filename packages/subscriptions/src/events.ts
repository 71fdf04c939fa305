/**
 * @quire/subscriptions — Subscription events.
 *
 * One stream per subscription (`subscription-<id>`). Every state change
 * is exactly one event; the projection in projection.ts folds them.
 */

import { z } from "zod";
import type { EventSchema } from "@quire/event-store";
import { IsoDateSchema, MoneySchema, PaymentMethodSchema } from "@quire/types";

export const SUBSCRIPTION_CREATED = "subscription.created";
export const SUBSCRIPTION_RENEWAL_STARTED = "subscription.renewal_started";
export const SUBSCRIPTION_CHARGE_ATTEMPTED = "subscription.charge_attempted";
export const SUBSCRIPTION_RENEWED = "subscription.renewed";
export const SUBSCRIPTION_CHARGE_FAILED = "subscription.charge_failed";
export const SUBSCRIPTION_CHARGE_RELEASED = "subscription.charge_released";
export const SUBSCRIPTION_PAUSED = "subscription.paused";
export const SUBSCRIPTION_RESUMED = "subscription.resumed";
export const SUBSCRIPTION_CANCELLED = "subscription.cancelled";

export function subscriptionStream(subscriptionId: string): string {
  return `subscription-${subscriptionId}`;
}

// ─── Payloads ────────────────────────────────────────────────────────────

export const SubscriptionCreatedPayloadSchema = z.object({
  id: z.string().min(1),
  userRef: z.string().min(1),
  planRef: z.string().min(1),
  amount: MoneySchema,
  frequency: z.enum(["monthly", "quarterly", "annual"]),
  paymentMethod: PaymentMethodSchema,
  currentPeriodStart: IsoDateSchema,
  currentPeriodEnd: IsoDateSchema,
  anchorDay: z.number().int().min(1).max(31),
  createdAt: IsoDateSchema,
});

export const RenewalStartedPayloadSchema = z.object({
  subscriptionId: z.string(),
  invoiceId: z.string(),
  startedAt: IsoDateSchema,
});

export const ChargeAttemptedPayloadSchema = z.object({
  subscriptionId: z.string(),
  invoiceId: z.string(),
  reference: z.string(),
  attempt: z.number().int().positive(),
  attemptedAt: IsoDateSchema,
});

export const RenewedPayloadSchema = z.object({
  subscriptionId: z.string(),
  invoiceId: z.string(),
  transactionId: z.string().optional(),
  periodStart: IsoDateSchema,
  periodEnd: IsoDateSchema,
  renewedAt: IsoDateSchema,
});

export const ChargeFailedPayloadSchema = z.object({
  subscriptionId: z.string(),
  invoiceId: z.string(),
  reason: z.string(),
  failedAttemptCount: z.number().int().positive(),
  nextRetryAt: IsoDateSchema,
  failedAt: IsoDateSchema,
  /** Charge still awaiting the provider; no new attempt starts until it resolves */
  chargeInFlight: z.string().optional(),
});

export const ChargeReleasedPayloadSchema = z.object({
  subscriptionId: z.string(),
  reference: z.string(),
  reason: z.string(),
  releasedAt: IsoDateSchema,
});

export const PausedPayloadSchema = z.object({
  subscriptionId: z.string(),
  pausedAt: IsoDateSchema,
});

export const ResumedPayloadSchema = z.object({
  subscriptionId: z.string(),
  resumedAt: IsoDateSchema,
});

export const CancelledPayloadSchema = z.object({
  subscriptionId: z.string(),
  reason: z.string().min(1),
  cancelledAt: IsoDateSchema,
});

export type SubscriptionCreatedPayload = z.infer<typeof SubscriptionCreatedPayloadSchema>;
export type RenewalStartedPayload = z.infer<typeof RenewalStartedPayloadSchema>;
export type ChargeAttemptedPayload = z.infer<typeof ChargeAttemptedPayloadSchema>;
export type RenewedPayload = z.infer<typeof RenewedPayloadSchema>;
export type ChargeFailedPayload = z.infer<typeof ChargeFailedPayloadSchema>;
export type ChargeReleasedPayload = z.infer<typeof ChargeReleasedPayloadSchema>;
export type PausedPayload = z.infer<typeof PausedPayloadSchema>;
export type ResumedPayload = z.infer<typeof ResumedPayloadSchema>;
export type CancelledPayload = z.infer<typeof CancelledPayloadSchema>;

function schema(type: string, description: string, payload: z.ZodTypeAny): EventSchema {
  return {
    type,
    version: 1,
    description,
    source: "subscriptions",
    validate: (p) => payload.safeParse(p).success,
  };
}

export const SUBSCRIPTION_EVENT_SCHEMAS: readonly EventSchema[] = [
  schema(SUBSCRIPTION_CREATED, "A subscription was created", SubscriptionCreatedPayloadSchema),
  schema(SUBSCRIPTION_RENEWAL_STARTED, "A period elapsed and its invoice was issued", RenewalStartedPayloadSchema),
  schema(SUBSCRIPTION_CHARGE_ATTEMPTED, "A renewal charge was sent to the provider", ChargeAttemptedPayloadSchema),
  schema(SUBSCRIPTION_RENEWED, "A renewal invoice was paid and the period advanced", RenewedPayloadSchema),
  schema(SUBSCRIPTION_CHARGE_FAILED, "A renewal charge failed; dunning continues", ChargeFailedPayloadSchema),
  schema(
    SUBSCRIPTION_CHARGE_RELEASED,
    "An in-flight charge already counted by dunning failed; the next retry may start",
    ChargeReleasedPayloadSchema,
  ),
  schema(SUBSCRIPTION_PAUSED, "A subscription was paused", PausedPayloadSchema),
  schema(SUBSCRIPTION_RESUMED, "A paused subscription was resumed", ResumedPayloadSchema),
  schema(SUBSCRIPTION_CANCELLED, "A subscription was cancelled", CancelledPayloadSchema),
];
