/**
 * @quire/subscriptions — Recurring Billing Orchestrator.
 *
 * Drives each subscription through renewal and dunning:
 *
 *   active ──period elapses──▶ renewal_pending ──settled──▶ active
 *                                     │
 *                                   failed
 *                                     ▼
 *                                 past_due ──retry settles──▶ active
 *                                     │
 *                         failures > maxRetries
 *                                     ▼
 *                                 cancelled  (renewal invoice voided)
 *
 * Any non-terminal state can be paused (then resumed to active) or
 * cancelled.
 *
 * Rules:
 * - Every change is one event on `subscription-<id>`, appended with the
 *   expected stream version; state is the fold of those events
 * - Work on one subscription is serialized by a keyed lock; different
 *   subscriptions proceed in parallel
 * - `charge_attempted` is written before the provider is called, so a
 *   crash mid-charge resumes with a status check, not a second charge
 * - Pause and cancel never abort a charge in flight; a late settlement
 *   pays the invoice and advances the period, the status stays put
 * - No new attempt starts while one is in flight. An overdue invoice
 *   counts as a failure but keeps the pending reference; when that charge
 *   later fails it is released without being counted again
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import pino from "pino";
import type { Logger } from "pino";
import type {
  BillingFrequency,
  Clock,
  DomainEvent,
  Invoice,
  Money,
  PaymentMethod,
  PaymentTransaction,
  RecurringBilling,
  SubscriptionStatus,
} from "@quire/types";
import {
  InvalidTransitionError,
  NotFoundError,
  ValidationError,
  MoneySchema,
  PaymentMethodSchema,
  systemClock,
} from "@quire/types";
import type { EventStore } from "@quire/event-store";
import { KeyedLock, createDomainEvent } from "@quire/event-store";
import { isPositive } from "@quire/ledger";
import type { BillingConfigStore } from "@quire/config";
import type { InvoiceManager } from "@quire/invoicing";
import type { ChargeExecutor, ChargeRequest, ChargeResult } from "@quire/gateway";
import { chargeReference, parseChargeReference } from "@quire/gateway";
import {
  SUBSCRIPTION_CANCELLED,
  SUBSCRIPTION_CHARGE_ATTEMPTED,
  SUBSCRIPTION_CHARGE_FAILED,
  SUBSCRIPTION_CHARGE_RELEASED,
  SUBSCRIPTION_CREATED,
  SUBSCRIPTION_PAUSED,
  SUBSCRIPTION_RENEWAL_STARTED,
  SUBSCRIPTION_RENEWED,
  SUBSCRIPTION_RESUMED,
  subscriptionStream,
} from "./events.js";
import type {
  CancelledPayload,
  ChargeAttemptedPayload,
  ChargeFailedPayload,
  ChargeReleasedPayload,
  RenewalStartedPayload,
  RenewedPayload,
  SubscriptionCreatedPayload,
} from "./events.js";
import { addDays, periodEnd } from "./periods.js";
import { SUBSCRIPTION_EVENT_TYPES, applySubscriptionEvent, subscriptionIdOf } from "./projection.js";

// =============================================================================
// Types
// =============================================================================

export interface SubscriptionOrchestratorOptions {
  readonly eventStore: EventStore;
  readonly invoices: InvoiceManager;
  readonly charges: ChargeExecutor;
  readonly config: BillingConfigStore;
  readonly lock?: KeyedLock;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly idFactory?: () => string;
}

export const CreateSubscriptionInputSchema = z.object({
  userRef: z.string().min(1),
  planRef: z.string().min(1),
  amount: MoneySchema,
  frequency: z.enum(["monthly", "quarterly", "annual"]),
  paymentMethod: PaymentMethodSchema,
  /** First period start; defaults to now */
  startAt: z.string().datetime({ offset: true }).optional(),
});

export interface CreateSubscriptionInput {
  readonly userRef: string;
  readonly planRef: string;
  readonly amount: Money;
  readonly frequency: BillingFrequency;
  readonly paymentMethod: PaymentMethod;
  readonly startAt?: string;
}

export const DUNNING_EXHAUSTED = "dunning_exhausted";

// =============================================================================
// Transitions
// =============================================================================

const VALID_TRANSITIONS: Readonly<Record<SubscriptionStatus, readonly SubscriptionStatus[]>> = {
  active: ["renewal_pending", "past_due", "paused", "cancelled"],
  renewal_pending: ["active", "past_due", "paused", "cancelled"],
  past_due: ["active", "past_due", "paused", "cancelled"],
  paused: ["active", "cancelled"],
  cancelled: [],
};

// =============================================================================
// Orchestrator
// =============================================================================

export class SubscriptionOrchestrator {
  private readonly _subscriptions = new Map<string, RecurringBilling>();
  private readonly _versions = new Map<string, number>();
  private readonly _events: EventStore;
  private readonly _invoices: InvoiceManager;
  private readonly _charges: ChargeExecutor;
  private readonly _config: BillingConfigStore;
  private readonly _lock: KeyedLock;
  private readonly _clock: Clock;
  private readonly _logger: Logger;
  private readonly _idFactory: () => string;

  constructor(options: SubscriptionOrchestratorOptions) {
    this._events = options.eventStore;
    this._invoices = options.invoices;
    this._charges = options.charges;
    this._config = options.config;
    this._lock = options.lock ?? new KeyedLock();
    this._clock = options.clock ?? systemClock;
    this._logger = (options.logger ?? pino({ level: "silent" })).child({ component: "subscriptions" });
    this._idFactory = options.idFactory ?? randomUUID;

    for (const stored of this._events.readAll()) {
      if (SUBSCRIPTION_EVENT_TYPES.has(stored.event.type)) {
        this._project(stored.event);
      }
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Start a subscription. The first charge happens when the first period
   * ends, on the tick after `currentPeriodEnd`.
   *
   * @throws ValidationError for a bad amount, payment method or currency
   */
  createSubscription(input: CreateSubscriptionInput): RecurringBilling {
    const parsed = CreateSubscriptionInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError("Invalid subscription", "VALIDATION_FAILED", {
        issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
      });
    }
    if (!isPositive(input.amount)) {
      throw new ValidationError("Subscription amount must be positive", "INVALID_AMOUNT");
    }

    const now = this._clock.now();
    const supported = this._config.resolve("currencies", "supported", now);
    if (!supported.includes(input.amount.currency)) {
      throw new ValidationError(
        `Currency ${input.amount.currency} is not accepted for billing`,
        "CURRENCY_MISMATCH",
      );
    }

    const start = input.startAt !== undefined ? new Date(input.startAt) : now;
    const payload: SubscriptionCreatedPayload = {
      id: this._idFactory(),
      userRef: input.userRef,
      planRef: input.planRef,
      amount: { ...input.amount },
      frequency: input.frequency,
      paymentMethod: { ...input.paymentMethod },
      currentPeriodStart: start.toISOString(),
      currentPeriodEnd: periodEnd(start, input.frequency).toISOString(),
      anchorDay: start.getUTCDate(),
      createdAt: now.toISOString(),
    };

    const subscription = this._append(undefined, SUBSCRIPTION_CREATED, payload);
    this._logger.info(
      { subscriptionId: subscription.id, userRef: subscription.userRef, planRef: subscription.planRef },
      "Subscription created",
    );
    return subscription;
  }

  /** @throws NotFoundError */
  getSubscription(id: string): RecurringBilling {
    const subscription = this._subscriptions.get(id);
    if (subscription === undefined) {
      throw new NotFoundError("Subscription", id);
    }
    return subscription;
  }

  listSubscriptions(userRef?: string): readonly RecurringBilling[] {
    const all = [...this._subscriptions.values()];
    return userRef === undefined ? all : all.filter((s) => s.userRef === userRef);
  }

  async pauseSubscription(id: string): Promise<RecurringBilling> {
    return this._lock.run(id, async () => {
      const subscription = this._transition(this.getSubscription(id), "paused", SUBSCRIPTION_PAUSED, {
        subscriptionId: id,
        pausedAt: this._clock.now().toISOString(),
      });
      this._logger.info({ subscriptionId: id }, "Subscription paused");
      return subscription;
    });
  }

  async resumeSubscription(id: string): Promise<RecurringBilling> {
    return this._lock.run(id, async () => {
      const current = this.getSubscription(id);
      if (current.status !== "paused") {
        throw new InvalidTransitionError("Subscription", current.status, "active");
      }
      const subscription = this._transition(current, "active", SUBSCRIPTION_RESUMED, {
        subscriptionId: id,
        resumedAt: this._clock.now().toISOString(),
      });
      this._logger.info({ subscriptionId: id }, "Subscription resumed");
      return subscription;
    });
  }

  /**
   * Cancel a subscription. An outstanding renewal invoice stays open, so a
   * charge already in flight can still pay it.
   */
  async cancelSubscription(id: string, reason: string): Promise<RecurringBilling> {
    if (reason.trim().length === 0) {
      throw new ValidationError("A cancellation reason is required");
    }
    return this._lock.run(id, async () => this._cancel(this.getSubscription(id), reason));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Renewal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Subscriptions a tick at `now` would act on.
   */
  dueSubscriptions(now: Date = this._clock.now()): readonly RecurringBilling[] {
    return [...this._subscriptions.values()].filter((s) => isDue(s, now));
  }

  /**
   * Advance one subscription as far as `now` allows: open the renewal,
   * charge, follow up on a pending charge or run the next dunning retry.
   * Does nothing for paused or cancelled subscriptions.
   */
  async tick(id: string): Promise<RecurringBilling> {
    return this._lock.run(id, async () => {
      let subscription = this.getSubscription(id);
      const now = this._clock.now();

      if (!isDue(subscription, now)) {
        return subscription;
      }

      if (subscription.status === "active") {
        subscription = await this._startRenewal(subscription, now);
      }

      return this._collect(subscription, now);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Payment effects
  // ───────────────────────────────────────────────────────────────────────

  /**
   * React to a ledger row written from a provider webhook. Settled charges
   * pay the invoice and renew; a failed charge for the attempt in flight
   * counts as a dunning failure. Everything else is ignored.
   */
  async handlePaymentRecorded(tx: PaymentTransaction): Promise<void> {
    if (tx.kind !== "charge" || tx.subjectRef.type !== "invoice") {
      return;
    }
    const invoiceId = tx.subjectRef.id;
    const subscriptionId = this._subscriptionOfInvoice(invoiceId);
    if (subscriptionId === undefined) {
      return;
    }

    await this._lock.run(subscriptionId, async () => {
      const subscription = this.getSubscription(subscriptionId);

      if (tx.status === "settled") {
        const invoice = this._invoices.applyPayment(invoiceId, tx.id);
        if (subscription.outstandingInvoiceId === invoiceId && invoice.status === "paid") {
          this._renew(subscription, invoice, tx.id);
        }
        return;
      }

      const reference = tx.metadata["chargeReference"];
      if (
        tx.status === "failed" &&
        reference !== undefined &&
        reference === subscription.pendingChargeReference &&
        subscription.status !== "paused" &&
        subscription.status !== "cancelled"
      ) {
        this._chargeFailed(subscription, invoiceId, reference, tx.failureReason ?? "declined");
      }
    });
  }

  /**
   * An unpaid renewal invoice passed its due date: start dunning.
   */
  async handleInvoiceOverdue(invoice: Invoice): Promise<void> {
    const subscriptionId = invoice.subscriptionId;
    if (subscriptionId === undefined || !this._subscriptions.has(subscriptionId)) {
      return;
    }

    await this._lock.run(subscriptionId, async () => {
      const subscription = this.getSubscription(subscriptionId);
      if (
        subscription.outstandingInvoiceId !== invoice.id ||
        (subscription.status !== "active" && subscription.status !== "renewal_pending")
      ) {
        return;
      }
      this._recordFailure(subscription, invoice.id, "invoice_overdue", subscription.pendingChargeReference);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal (callers hold the subscription lock)
  // ───────────────────────────────────────────────────────────────────────

  private async _startRenewal(subscription: RecurringBilling, now: Date): Promise<RecurringBilling> {
    const invoiceId =
      subscription.outstandingInvoiceId ?? (await this._renewalInvoice(subscription)).id;

    const payload: RenewalStartedPayload = {
      subscriptionId: subscription.id,
      invoiceId,
      startedAt: now.toISOString(),
    };
    const next = this._transition(subscription, "renewal_pending", SUBSCRIPTION_RENEWAL_STARTED, payload);
    this._logger.info({ subscriptionId: subscription.id, invoiceId }, "Renewal started");
    return next;
  }

  /**
   * The invoice for the period after `currentPeriodEnd`. An open invoice
   * for this subscription that no renewal has claimed yet is reused, so a
   * crash between issuing and recording it does not bill twice.
   */
  private async _renewalInvoice(subscription: RecurringBilling): Promise<Invoice> {
    const orphan = this._invoices
      .listInvoices(subscription.userRef)
      .find(
        (i) =>
          i.subscriptionId === subscription.id &&
          !subscription.invoiceIds.includes(i.id) &&
          (i.status === "issued" || i.status === "overdue"),
      );
    if (orphan !== undefined) {
      return orphan;
    }

    const start = new Date(subscription.currentPeriodEnd);
    const end = this._nextPeriodEnd(subscription, start);
    return this._invoices.createInvoice(
      subscription.userRef,
      [
        {
          description: `Subscription ${subscription.planRef} (${day(start)} to ${day(end)})`,
          quantity: 1,
          unitPrice: subscription.amount,
          itemType: "subscription",
        },
      ],
      subscription.amount.currency,
      { subscriptionId: subscription.id },
    );
  }

  /** renewal_pending or past_due with an open invoice: get it paid. */
  private async _collect(subscription: RecurringBilling, now: Date): Promise<RecurringBilling> {
    const invoiceId = subscription.outstandingInvoiceId;
    if (invoiceId === undefined) {
      return subscription;
    }
    const invoice = this._invoices.getInvoice(invoiceId);

    // Paid out of band (manual transfer, a webhook the handler missed)
    if (invoice.status === "paid") {
      return this._renew(subscription, invoice, invoice.paymentTransactionIds[0]);
    }

    const pending = subscription.pendingChargeReference;
    if (pending !== undefined) {
      const request = this._chargeRequest(subscription, invoice, pending);
      const result = await this._charges.checkStatus(request);
      if (result !== null) {
        return this._handleResult(this.getSubscription(subscription.id), invoice, pending, result);
      }
      this._logger.info({ subscriptionId: subscription.id, reference: pending }, "Charge unknown to provider, resending");
      return this._handleResult(
        this.getSubscription(subscription.id),
        invoice,
        pending,
        await this._charges.execute(request),
      );
    }

    const attempt = subscription.failedAttemptCount + 1;
    const reference = chargeReference(invoice.id, attempt);
    const payload: ChargeAttemptedPayload = {
      subscriptionId: subscription.id,
      invoiceId: invoice.id,
      reference,
      attempt,
      attemptedAt: now.toISOString(),
    };
    const attempting = this._append(subscription, SUBSCRIPTION_CHARGE_ATTEMPTED, payload);
    this._logger.info({ subscriptionId: subscription.id, reference, attempt }, "Charging renewal");

    const result = await this._charges.execute(this._chargeRequest(attempting, invoice, reference));
    return this._handleResult(this.getSubscription(subscription.id), invoice, reference, result);
  }

  private _handleResult(
    subscription: RecurringBilling,
    invoice: Invoice,
    reference: string,
    result: ChargeResult,
  ): RecurringBilling {
    switch (result.status) {
      case "pending":
        return subscription;
      case "settled": {
        const paid = this._invoices.applyPayment(invoice.id, result.transaction.id);
        if (paid.status !== "paid") {
          this._logger.warn(
            { subscriptionId: subscription.id, invoiceId: invoice.id, status: paid.status },
            "Settled renewal charge did not pay its invoice",
          );
          return subscription;
        }
        return this._renew(subscription, paid, result.transaction.id);
      }
      case "failed":
        return this._chargeFailed(
          subscription,
          invoice.id,
          reference,
          result.transaction.failureReason ?? "declined",
        );
    }
  }

  private _renew(subscription: RecurringBilling, invoice: Invoice, transactionId: string | undefined): RecurringBilling {
    const start = new Date(subscription.currentPeriodEnd);
    const payload: RenewedPayload = {
      subscriptionId: subscription.id,
      invoiceId: invoice.id,
      ...(transactionId !== undefined ? { transactionId } : {}),
      periodStart: start.toISOString(),
      periodEnd: this._nextPeriodEnd(subscription, start).toISOString(),
      renewedAt: this._clock.now().toISOString(),
    };
    // Not a status transition when paused or cancelled; the period still advances
    const next = this._append(subscription, SUBSCRIPTION_RENEWED, payload);
    this._logger.info(
      { subscriptionId: subscription.id, invoiceId: invoice.id, periodEnd: next.currentPeriodEnd },
      "Subscription renewed",
    );
    return next;
  }

  /** A charge under `reference` failed. Attempts dunning already counted are only released. */
  private _chargeFailed(
    subscription: RecurringBilling,
    invoiceId: string,
    reference: string,
    reason: string,
  ): RecurringBilling {
    if (parseChargeReference(reference).attempt > subscription.failedAttemptCount) {
      return this._recordFailure(subscription, invoiceId, reason);
    }
    const payload: ChargeReleasedPayload = {
      subscriptionId: subscription.id,
      reference,
      reason,
      releasedAt: this._clock.now().toISOString(),
    };
    const next = this._append(subscription, SUBSCRIPTION_CHARGE_RELEASED, payload);
    this._logger.info({ subscriptionId: subscription.id, reference, reason }, "Counted charge failed, released");
    return next;
  }

  private _recordFailure(
    subscription: RecurringBilling,
    invoiceId: string,
    reason: string,
    chargeInFlight?: string,
  ): RecurringBilling {
    const now = this._clock.now();
    const policy = this._config.resolve("retry_policy", "default", now);
    const count = subscription.failedAttemptCount + 1;

    if (count > policy.maxRetries) {
      this._logger.warn(
        { subscriptionId: subscription.id, failedAttemptCount: count, reason },
        "Retry budget exhausted, cancelling subscription",
      );
      const cancelled = this._cancel(subscription, DUNNING_EXHAUSTED);
      const invoice = this._invoices.getInvoice(invoiceId);
      if (invoice.status === "issued" || invoice.status === "overdue") {
        this._invoices.voidInvoice(invoiceId, DUNNING_EXHAUSTED);
      }
      return cancelled;
    }

    const delays = policy.retryDelaysDays;
    const delay = delays[Math.min(count - 1, delays.length - 1)] ?? 0;
    const payload: ChargeFailedPayload = {
      subscriptionId: subscription.id,
      invoiceId,
      reason,
      failedAttemptCount: count,
      nextRetryAt: addDays(now, delay).toISOString(),
      failedAt: now.toISOString(),
      ...(chargeInFlight !== undefined ? { chargeInFlight } : {}),
    };
    const next = this._transition(subscription, "past_due", SUBSCRIPTION_CHARGE_FAILED, payload);
    this._logger.warn(
      { subscriptionId: subscription.id, failedAttemptCount: count, nextRetryAt: payload.nextRetryAt, reason },
      "Renewal charge failed",
    );
    return next;
  }

  private _cancel(subscription: RecurringBilling, reason: string): RecurringBilling {
    const payload: CancelledPayload = {
      subscriptionId: subscription.id,
      reason,
      cancelledAt: this._clock.now().toISOString(),
    };
    const next = this._transition(subscription, "cancelled", SUBSCRIPTION_CANCELLED, payload);
    this._logger.info({ subscriptionId: subscription.id, reason }, "Subscription cancelled");
    return next;
  }

  private _chargeRequest(subscription: RecurringBilling, invoice: Invoice, reference: string): ChargeRequest {
    const { invoiceId } = parseChargeReference(reference);
    return {
      reference,
      amount: invoice.total,
      paymentMethod: subscription.paymentMethod,
      subjectRef: { type: "invoice", id: invoiceId },
      description: `${invoice.number} ${subscription.planRef}`,
      metadata: { subscriptionId: subscription.id },
    };
  }

  /** Period ends stay on the anchor day, clamped in shorter months. */
  private _nextPeriodEnd(subscription: RecurringBilling, start: Date): Date {
    return periodEnd(start, subscription.frequency, subscription.anchorDay);
  }

  private _subscriptionOfInvoice(invoiceId: string): string | undefined {
    for (const subscription of this._subscriptions.values()) {
      if (subscription.invoiceIds.includes(invoiceId)) {
        return subscription.id;
      }
    }
    return undefined;
  }

  private _transition(
    subscription: RecurringBilling,
    to: SubscriptionStatus,
    type: string,
    payload: Readonly<Record<string, unknown>>,
  ): RecurringBilling {
    if (!VALID_TRANSITIONS[subscription.status].includes(to)) {
      throw new InvalidTransitionError("Subscription", subscription.status, to);
    }
    return this._append(subscription, type, payload);
  }

  private _append(
    subscription: RecurringBilling | undefined,
    type: string,
    payload: Readonly<Record<string, unknown>>,
  ): RecurringBilling {
    const event = createDomainEvent(type, "subscriptions", payload, {
      timestamp: this._clock.now().toISOString(),
    });
    const id = subscription?.id ?? subscriptionIdOf(event);
    const version = this._versions.get(id) ?? 0;
    this._events.append(subscriptionStream(id), [event], {
      expectedVersion: version === 0 ? "no_stream" : version,
    });
    return this._project(event);
  }

  private _project(event: DomainEvent): RecurringBilling {
    const id = subscriptionIdOf(event);
    const next = applySubscriptionEvent(this._subscriptions.get(id), event);
    this._subscriptions.set(id, next);
    this._versions.set(id, (this._versions.get(id) ?? 0) + 1);
    return next;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function isDue(subscription: RecurringBilling, now: Date): boolean {
  switch (subscription.status) {
    case "active":
      return Date.parse(subscription.currentPeriodEnd) <= now.getTime();
    case "renewal_pending":
      return true;
    case "past_due":
      return (
        subscription.pendingChargeReference !== undefined ||
        subscription.nextRetryAt === undefined ||
        Date.parse(subscription.nextRetryAt) <= now.getTime()
      );
    case "paused":
    case "cancelled":
      return false;
  }
}

function day(date: Date): string {
  return date.toISOString().slice(0, 10);
}
