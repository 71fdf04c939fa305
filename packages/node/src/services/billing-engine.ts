/**
 * BillingEngine — Composition root for the billing packages.
 *
 * Route handlers and background tasks delegate to this service; they never
 * construct domain components themselves. Every component receives its
 * stores, clock and logger from here, so tests can swap any of them.
 *
 * Wiring:
 * - One event catalog with every component's schemas
 * - JSONL collections under `dataDir` (ledger, events, config), or
 *   in-memory stores when no directory is given
 * - Webhook effects: settled charges pay their invoice, and subscription
 *   invoices go through the orchestrator. They run after the webhook is
 *   answered; `reconcilePayments` re-applies any that failed
 * - Overdue invoices feed the dunning schedule
 */

import { randomUUID } from "node:crypto";
import { join } from "node:path";
import pino from "pino";
import type { Logger } from "pino";
import type {
  AuthorRoyalty,
  Clock,
  Currency,
  Invoice,
  InvoiceItem,
  Money,
  PaymentTransaction,
  Period,
  RecurringBilling,
} from "@quire/types";
import { systemClock } from "@quire/types";
import type { EventStore, EventStoreIntegrityResult } from "@quire/event-store";
import { EventCatalog, InMemoryEventStore, JsonlEventStore } from "@quire/event-store";
import type { LedgerStore } from "@quire/ledger";
import { InMemoryLedgerStore, JsonlLedgerStore } from "@quire/ledger";
import type { ConfigEntry, ConfigType, ConfigValues } from "@quire/config";
import { BillingConfigStore, CONFIG_EVENT_SCHEMAS, applyDefaults } from "@quire/config";
import type { PaymentProvider, RetryConfig, WebhookIngestResult } from "@quire/gateway";
import { ChargeExecutor, ProviderRegistry, WebhookIngestor } from "@quire/gateway";
import type { CreateInvoiceOptions } from "@quire/invoicing";
import { INVOICE_EVENT_SCHEMAS, InvoiceManager } from "@quire/invoicing";
import type { CreateSubscriptionInput } from "@quire/subscriptions";
import { SUBSCRIPTION_EVENT_SCHEMAS, SubscriptionOrchestrator } from "@quire/subscriptions";
import type { AttributionResolver, ComputeRoyaltiesOptions, RoyaltySummary } from "@quire/royalties";
import { ROYALTY_EVENT_SCHEMAS, RoyaltyCalculator } from "@quire/royalties";

// =============================================================================
// Configuration
// =============================================================================

/** Which component an id is generated for. */
export type IdKind = "transaction" | "invoice" | "subscription" | "royalty";

export interface BillingEngineOptions {
  /** JSONL persistence directory; in-memory stores when undefined */
  readonly dataDir?: string;
  readonly billingEntity?: string;
  readonly invoiceNumberPrefix?: string;
  readonly providers?: readonly PaymentProvider[];
  readonly attribution?: AttributionResolver;
  /** Effective date of the default configuration entries. Default: 2026-01-01T00:00:00.000Z */
  readonly defaultsEffectiveFrom?: string;
  readonly chargeRetry?: RetryConfig;
  readonly sleepFn?: (ms: number) => Promise<void>;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly idFactory?: (kind: IdKind) => string;
}

export interface EngineHealth {
  readonly status: "ok" | "down";
  readonly persistence: "jsonl" | "memory";
  readonly providers: readonly string[];
  readonly ledgerRows: number;
  readonly events: EventStoreIntegrityResult;
  readonly config: EventStoreIntegrityResult;
}

export const DEFAULTS_EFFECTIVE_FROM = "2026-01-01T00:00:00.000Z";

// =============================================================================
// Service
// =============================================================================

export class BillingEngine {
  readonly eventStore: EventStore;
  readonly configEvents: EventStore;
  readonly ledger: LedgerStore;
  readonly config: BillingConfigStore;
  readonly providers: ProviderRegistry;
  readonly webhooks: WebhookIngestor;
  readonly charges: ChargeExecutor;
  readonly invoices: InvoiceManager;
  readonly subscriptions: SubscriptionOrchestrator;
  readonly royalties: RoyaltyCalculator;

  private readonly _persistence: "jsonl" | "memory";
  private readonly _logger: Logger;

  constructor(options: BillingEngineOptions = {}) {
    const clock = options.clock ?? systemClock;
    const logger = options.logger ?? pino({ level: "silent" });
    const ids = options.idFactory ?? (() => randomUUID());
    this._logger = logger.child({ component: "billing-engine" });

    const catalog = new EventCatalog();
    catalog.registerAll(CONFIG_EVENT_SCHEMAS);
    catalog.registerAll(INVOICE_EVENT_SCHEMAS);
    catalog.registerAll(SUBSCRIPTION_EVENT_SCHEMAS);
    catalog.registerAll(ROYALTY_EVENT_SCHEMAS);

    if (options.dataDir !== undefined) {
      this._persistence = "jsonl";
      this.ledger = new JsonlLedgerStore({ filePath: join(options.dataDir, "ledger.jsonl"), logger });
      this.eventStore = new JsonlEventStore({ catalog, filePath: join(options.dataDir, "events.jsonl") });
      this.configEvents = new JsonlEventStore({ catalog, filePath: join(options.dataDir, "config.jsonl") });
    } else {
      this._persistence = "memory";
      this.ledger = new InMemoryLedgerStore();
      this.eventStore = new InMemoryEventStore({ catalog });
      this.configEvents = new InMemoryEventStore({ catalog });
    }

    this.config = new BillingConfigStore({ eventStore: this.configEvents, clock, logger });
    const written = applyDefaults(this.config, options.defaultsEffectiveFrom ?? DEFAULTS_EFFECTIVE_FROM);
    if (written > 0) {
      this._logger.info({ entries: written }, "Default billing configuration recorded");
    }

    this.providers = new ProviderRegistry(options.providers ?? []);
    this.webhooks = new WebhookIngestor({
      providers: this.providers,
      ledger: this.ledger,
      clock,
      logger,
      idFactory: () => ids("transaction"),
    });
    this.charges = new ChargeExecutor({
      providers: this.providers,
      ledger: this.ledger,
      clock,
      logger,
      idFactory: () => ids("transaction"),
      ...(options.chargeRetry !== undefined ? { retry: options.chargeRetry } : {}),
      ...(options.sleepFn !== undefined ? { sleepFn: options.sleepFn } : {}),
    });
    this.invoices = new InvoiceManager({
      eventStore: this.eventStore,
      ledger: this.ledger,
      config: this.config,
      clock,
      logger,
      idFactory: () => ids("invoice"),
      ...(options.billingEntity !== undefined ? { billingEntity: options.billingEntity } : {}),
      ...(options.invoiceNumberPrefix !== undefined ? { numberPrefix: options.invoiceNumberPrefix } : {}),
    });
    this.subscriptions = new SubscriptionOrchestrator({
      eventStore: this.eventStore,
      invoices: this.invoices,
      charges: this.charges,
      config: this.config,
      clock,
      logger,
      idFactory: () => ids("subscription"),
    });
    this.royalties = new RoyaltyCalculator({
      eventStore: this.eventStore,
      ledger: this.ledger,
      config: this.config,
      clock,
      logger,
      idFactory: () => ids("royalty"),
      ...(options.attribution !== undefined ? { attribution: options.attribution } : {}),
    });

    this.webhooks.onPayment((tx) => this._applyPaymentEffects(tx));

    this._logger.info(
      { persistence: this._persistence, providers: this.providers.list() },
      "Billing engine ready",
    );
  }

  // ─── Webhook ingress ───────────────────────────────────────────────

  ingestWebhook(
    provider: string,
    rawPayload: string,
    signatureHeader: string | undefined,
  ): Promise<WebhookIngestResult> {
    return this.webhooks.ingest(provider, rawPayload, signatureHeader);
  }

  // ─── Invoices ──────────────────────────────────────────────────────

  createInvoice(
    userRef: string,
    items: readonly InvoiceItem[],
    currency: Currency,
    options?: CreateInvoiceOptions,
  ): Promise<Invoice> {
    return this.invoices.createInvoice(userRef, items, currency, options);
  }

  getInvoice(id: string): Invoice {
    return this.invoices.getInvoice(id);
  }

  listInvoices(userRef?: string): readonly Invoice[] {
    return this.invoices.listInvoices(userRef);
  }

  voidInvoice(id: string, reason: string): Invoice {
    return this.invoices.voidInvoice(id, reason);
  }

  /** Mark past-due invoices overdue and start dunning for renewal invoices. */
  async sweepOverdue(): Promise<readonly Invoice[]> {
    const changed = this.invoices.markOverdue();
    for (const invoice of changed) {
      await this.subscriptions.handleInvoiceOverdue(invoice);
    }
    return changed;
  }

  // ─── Subscriptions ─────────────────────────────────────────────────

  createSubscription(input: CreateSubscriptionInput): RecurringBilling {
    return this.subscriptions.createSubscription(input);
  }

  getSubscription(id: string): RecurringBilling {
    return this.subscriptions.getSubscription(id);
  }

  listSubscriptions(userRef?: string): readonly RecurringBilling[] {
    return this.subscriptions.listSubscriptions(userRef);
  }

  pauseSubscription(id: string): Promise<RecurringBilling> {
    return this.subscriptions.pauseSubscription(id);
  }

  resumeSubscription(id: string): Promise<RecurringBilling> {
    return this.subscriptions.resumeSubscription(id);
  }

  cancelSubscription(id: string, reason: string): Promise<RecurringBilling> {
    return this.subscriptions.cancelSubscription(id, reason);
  }

  tickSubscription(id: string): Promise<RecurringBilling> {
    return this.subscriptions.tick(id);
  }

  // ─── Royalties ─────────────────────────────────────────────────────

  computeRoyalties(period: Period, options?: ComputeRoyaltiesOptions): Promise<readonly AuthorRoyalty[]> {
    return this.royalties.computeRoyalties(period, options);
  }

  getRoyaltySummary(authorRef: string, period: Period): RoyaltySummary {
    return this.royalties.getRoyaltySummary(authorRef, period);
  }

  recordRoyaltyCorrection(royaltyId: string, adjustment: Money, reason: string): Promise<AuthorRoyalty> {
    return this.royalties.recordCorrection(royaltyId, adjustment, reason);
  }

  markRoyaltiesPaid(authorRef: string, period: Period, payoutTransactionId: string): Promise<readonly AuthorRoyalty[]> {
    return this.royalties.markPaid(authorRef, period, payoutTransactionId);
  }

  // ─── Configuration ─────────────────────────────────────────────────

  setConfig<T extends ConfigType>(
    configType: T,
    key: string,
    value: ConfigValues[T],
    effectiveFrom: string | Date,
  ): ConfigEntry<T> {
    return this.config.setConfig(configType, key, value, effectiveFrom);
  }

  // ─── Reconciliation ────────────────────────────────────────────────

  /**
   * Re-run payment effects for settled charges against open invoices.
   * Covers effects lost to a crash between the ledger write and the
   * invoice or subscription update. Safe to repeat.
   *
   * @returns number of ledger rows re-applied
   */
  async reconcilePayments(): Promise<number> {
    let applied = 0;
    for (const invoice of this.invoices.listInvoices()) {
      if (invoice.status !== "issued" && invoice.status !== "overdue") {
        continue;
      }
      const rows = this.ledger.query({
        subject: { type: "invoice", id: invoice.id },
        kinds: ["charge"],
        statuses: ["settled"],
      });
      for (const tx of rows) {
        await this._applyPaymentEffects(tx);
        applied++;
      }
    }
    if (applied > 0) {
      this._logger.info({ applied }, "Re-applied settled payments");
    }
    return applied;
  }

  // ─── Health ────────────────────────────────────────────────────────

  health(): EngineHealth {
    const events = this.eventStore.verifyIntegrity();
    const config = this.configEvents.verifyIntegrity();
    return {
      status: events.valid && config.valid ? "ok" : "down",
      persistence: this._persistence,
      providers: this.providers.list(),
      ledgerRows: this.ledger.size,
      events,
      config,
    };
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private async _applyPaymentEffects(tx: PaymentTransaction): Promise<void> {
    if (tx.kind !== "charge" || tx.subjectRef.type !== "invoice") {
      return;
    }
    const invoiceId = tx.subjectRef.id;
    if (!this.invoices.hasInvoice(invoiceId)) {
      this._logger.warn({ transactionId: tx.id, invoiceId }, "Payment references an unknown invoice");
      return;
    }

    // Subscription invoices are paid under the subscription's lock.
    if (tx.status === "settled" && this.invoices.getInvoice(invoiceId).subscriptionId === undefined) {
      this.invoices.applyPayment(invoiceId, tx.id);
    }
    await this.subscriptions.handlePaymentRecorded(tx);
  }
}
