/**
 * @quire/invoicing — Invoice Manager.
 *
 * Creates, numbers, settles and voids invoices. State is a fold of
 * events; the in-memory map is a projection rebuilt on start.
 *
 * Rules:
 * - Numbers are gapless per billing entity: the sequence is the version of
 *   the entity's issue stream, allocated under a per-entity lock and
 *   written with an expected-version check
 * - All items share the invoice currency; total = Σ quantity × unitPrice
 * - `paid` only once settled ledger rows referencing the invoice cover
 *   the total; recomputed from the ledger, never accumulated
 * - Paid and void are terminal
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type {
  Clock,
  Currency,
  DomainEvent,
  Invoice,
  InvoiceItem,
  InvoiceStatus,
  Money,
} from "@quire/types";
import {
  InvalidTransitionError,
  NotFoundError,
  SequenceConflictError,
  ValidationError,
  systemClock,
} from "@quire/types";
import type { EventStore } from "@quire/event-store";
import { EventStoreError, KeyedLock, createDomainEvent } from "@quire/event-store";
import type { LedgerStore } from "@quire/ledger";
import { addMoney, compareMoney, isNegative, netSettled, zeroMoney } from "@quire/ledger";
import type { BillingConfigStore } from "@quire/config";
import {
  INVOICE_ISSUED,
  INVOICE_OVERDUE,
  INVOICE_PAID,
  INVOICE_VOIDED,
  entityStream,
  invoiceStream,
} from "./events.js";
import type {
  InvoiceIssuedPayload,
  InvoiceOverduePayload,
  InvoicePaidPayload,
  InvoiceVoidedPayload,
} from "./events.js";
import { computeTotal, taxItem, validateItems } from "./items.js";
import { INVOICE_EVENT_TYPES, applyInvoiceEvent, invoiceIdOf } from "./projection.js";

// =============================================================================
// Types
// =============================================================================

export interface InvoiceManagerOptions {
  readonly eventStore: EventStore;
  readonly ledger: LedgerStore;
  readonly config: BillingConfigStore;
  /** Default: "default" */
  readonly billingEntity?: string;
  /** Default: "INV" */
  readonly numberPrefix?: string;
  /** Attempts after a sequence conflict before giving up. Default: 3 */
  readonly maxSequenceRetries?: number;
  readonly lock?: KeyedLock;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly idFactory?: () => string;
}

export interface CreateInvoiceOptions {
  readonly subscriptionId?: string;
  /** Adds a tax line from the `tax_rate` configuration of this country */
  readonly taxCountry?: string;
  /** Overrides the `payment_terms` due date */
  readonly dueAt?: string;
  readonly billingEntity?: string;
  readonly correlationId?: string;
}

export interface CurrencyTotals {
  readonly invoiced: Money;
  readonly paid: Money;
  readonly outstanding: Money;
}

export interface InvoiceStatistics {
  readonly count: number;
  readonly byStatus: Readonly<Record<InvoiceStatus, number>>;
  readonly byCurrency: Readonly<Partial<Record<Currency, CurrencyTotals>>>;
}

// =============================================================================
// Transitions
// =============================================================================

const VALID_TRANSITIONS: Readonly<Record<InvoiceStatus, readonly InvoiceStatus[]>> = {
  draft: ["issued", "void"],
  issued: ["paid", "overdue", "void"],
  overdue: ["paid", "void"],
  paid: [],
  void: [],
};

const DAY_MS = 24 * 60 * 60 * 1000;

// =============================================================================
// Manager
// =============================================================================

export class InvoiceManager {
  private readonly _invoices = new Map<string, Invoice>();
  private readonly _events: EventStore;
  private readonly _ledger: LedgerStore;
  private readonly _config: BillingConfigStore;
  private readonly _billingEntity: string;
  private readonly _prefix: string;
  private readonly _maxSequenceRetries: number;
  private readonly _lock: KeyedLock;
  private readonly _clock: Clock;
  private readonly _logger: Logger;
  private readonly _idFactory: () => string;

  constructor(options: InvoiceManagerOptions) {
    this._events = options.eventStore;
    this._ledger = options.ledger;
    this._config = options.config;
    this._billingEntity = options.billingEntity ?? "default";
    this._prefix = options.numberPrefix ?? "INV";
    this._maxSequenceRetries = options.maxSequenceRetries ?? 3;
    this._lock = options.lock ?? new KeyedLock();
    this._clock = options.clock ?? systemClock;
    this._logger = (options.logger ?? pino({ level: "silent" })).child({ component: "invoicing" });
    this._idFactory = options.idFactory ?? randomUUID;

    for (const stored of this._events.readAll()) {
      if (INVOICE_EVENT_TYPES.has(stored.event.type)) {
        this._project(stored.event);
      }
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Creation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Validate, number and issue an invoice.
   *
   * Everything that can fail validation is checked before a sequence
   * number is taken, so a rejected invoice never leaves a gap.
   *
   * @throws ValidationError for bad items or an unsupported currency
   * @throws ConfigMissingError when currencies, terms or tax are not configured
   * @throws SequenceConflictError if numbering keeps conflicting
   */
  async createInvoice(
    userRef: string,
    items: readonly InvoiceItem[],
    currency: Currency,
    options: CreateInvoiceOptions = {},
  ): Promise<Invoice> {
    const issuedAt = this._clock.now();
    const draft = this._draft(userRef, items, currency, issuedAt, options);
    const billingEntity = options.billingEntity ?? this._billingEntity;

    return this._lock.run(billingEntity, async () => {
      for (let attempt = 0; ; attempt++) {
        try {
          return this._issue(billingEntity, draft, options.correlationId);
        } catch (err) {
          if (!(err instanceof SequenceConflictError) || attempt >= this._maxSequenceRetries) {
            throw err;
          }
          this._logger.warn({ billingEntity, attempt }, "Invoice sequence conflict, retrying");
        }
      }
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /** @throws NotFoundError */
  getInvoice(id: string): Invoice {
    const invoice = this._invoices.get(id);
    if (invoice === undefined) {
      throw new NotFoundError("Invoice", id);
    }
    return invoice;
  }

  hasInvoice(id: string): boolean {
    return this._invoices.has(id);
  }

  /** Invoices in issue order, optionally for one user. */
  listInvoices(userRef?: string): readonly Invoice[] {
    const all = [...this._invoices.values()];
    return userRef === undefined ? all : all.filter((i) => i.userRef === userRef);
  }

  getStatistics(userRef?: string): InvoiceStatistics {
    const byStatus: Record<InvoiceStatus, number> = { draft: 0, issued: 0, paid: 0, overdue: 0, void: 0 };
    const byCurrency: Partial<Record<Currency, CurrencyTotals>> = {};
    const invoices = this.listInvoices(userRef);

    for (const invoice of invoices) {
      byStatus[invoice.status]++;
      if (invoice.status === "void") {
        continue;
      }
      const zero = zeroMoney(invoice.currency);
      const t = byCurrency[invoice.currency] ?? { invoiced: zero, paid: zero, outstanding: zero };
      byCurrency[invoice.currency] = {
        invoiced: addMoney(t.invoiced, invoice.total),
        paid: invoice.status === "paid" ? addMoney(t.paid, invoice.total) : t.paid,
        outstanding: invoice.status === "paid" ? t.outstanding : addMoney(t.outstanding, invoice.total),
      };
    }

    return { count: invoices.length, byStatus, byCurrency };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Transitions
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Recompute what has been paid against an invoice and mark it paid once
   * the total is covered. Safe to call any number of times.
   *
   * @param transactionId - the row that triggered the call; must reference this invoice
   */
  applyPayment(invoiceId: string, transactionId?: string): Invoice {
    const invoice = this.getInvoice(invoiceId);

    if (transactionId !== undefined) {
      const tx = this._ledger.get(transactionId);
      if (tx === undefined || tx.subjectRef.type !== "invoice" || tx.subjectRef.id !== invoiceId) {
        throw new ValidationError(`Transaction "${transactionId}" does not pay invoice "${invoiceId}"`);
      }
    }

    if (invoice.status === "paid") {
      return invoice;
    }
    if (invoice.status === "void") {
      this._logger.warn({ invoiceId, transactionId }, "Payment recorded against a void invoice");
      return invoice;
    }

    const rows = [
      ...this._ledger.query({
        subject: { type: "invoice", id: invoiceId },
        currency: invoice.currency,
      }),
    ];
    const paid = netSettled(rows, invoice.currency);
    if (compareMoney(paid, invoice.total) < 0) {
      return invoice;
    }

    const payload: InvoicePaidPayload = {
      invoiceId,
      paidAt: this._clock.now().toISOString(),
      amountPaid: paid,
      transactionIds: rows.filter((r) => r.kind === "charge" && r.status === "settled").map((r) => r.id),
    };
    const updated = this._transition(invoice, "paid", INVOICE_PAID, payload);
    this._logger.info({ invoiceId, number: invoice.number, amountPaid: paid }, "Invoice paid");
    return updated;
  }

  /** @throws InvalidTransitionError for paid or void invoices */
  voidInvoice(invoiceId: string, reason: string): Invoice {
    if (reason.trim().length === 0) {
      throw new ValidationError("A void reason is required");
    }
    const invoice = this.getInvoice(invoiceId);
    const payload: InvoiceVoidedPayload = {
      invoiceId,
      reason,
      voidedAt: this._clock.now().toISOString(),
    };
    const updated = this._transition(invoice, "void", INVOICE_VOIDED, payload);
    this._logger.info({ invoiceId, number: invoice.number, reason }, "Invoice voided");
    return updated;
  }

  /**
   * Move every issued invoice whose due date has passed to `overdue`.
   *
   * @returns the invoices that changed
   */
  markOverdue(now: Date = this._clock.now()): readonly Invoice[] {
    const changed: Invoice[] = [];
    for (const invoice of this._invoices.values()) {
      if (invoice.status !== "issued" || Date.parse(invoice.dueAt) >= now.getTime()) {
        continue;
      }
      const payload: InvoiceOverduePayload = {
        invoiceId: invoice.id,
        dueAt: invoice.dueAt,
        markedAt: now.toISOString(),
      };
      changed.push(this._transition(invoice, "overdue", INVOICE_OVERDUE, payload));
    }
    if (changed.length > 0) {
      this._logger.info({ count: changed.length }, "Invoices marked overdue");
    }
    return changed;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  private _draft(
    userRef: string,
    items: readonly InvoiceItem[],
    currency: Currency,
    issuedAt: Date,
    options: CreateInvoiceOptions,
  ): Omit<InvoiceIssuedPayload, "sequence" | "number" | "billingEntity"> {
    if (userRef.trim().length === 0) {
      throw new ValidationError("userRef is required");
    }

    const supported = this._config.resolve("currencies", "supported", issuedAt);
    if (!supported.includes(currency)) {
      throw new ValidationError(`Currency ${currency} is not accepted for invoicing`, "CURRENCY_MISMATCH");
    }

    validateItems(items, currency);

    const lines = [...items];
    if (options.taxCountry !== undefined) {
      const country = this._config.has("tax_rate", options.taxCountry, issuedAt) ? options.taxCountry : "default";
      const rate = this._config.resolveRate("tax_rate", country, issuedAt);
      const mode = this._config.resolve("rounding_mode", "tax", issuedAt);
      const tax = taxItem(lines, currency, options.taxCountry, rate, mode);
      if (tax !== null) {
        lines.push(tax);
      }
    }

    const total = computeTotal(lines, currency);
    if (isNegative(total)) {
      throw new ValidationError("Invoice total must not be negative", "INVALID_AMOUNT");
    }

    let dueAt: string;
    if (options.dueAt !== undefined) {
      const due = Date.parse(options.dueAt);
      if (Number.isNaN(due) || due < issuedAt.getTime()) {
        throw new ValidationError(`dueAt must be a date on or after the issue date`);
      }
      dueAt = new Date(due).toISOString();
    } else {
      const terms = this._config.resolve("payment_terms", "default", issuedAt);
      dueAt = new Date(issuedAt.getTime() + terms.dueDays * DAY_MS).toISOString();
    }

    return {
      id: this._idFactory(),
      userRef,
      items: lines.map((i) => ({ ...i })),
      currency,
      total,
      ...(options.subscriptionId !== undefined ? { subscriptionId: options.subscriptionId } : {}),
      issuedAt: issuedAt.toISOString(),
      dueAt,
    };
  }

  /** Runs under the entity lock. */
  private _issue(
    billingEntity: string,
    draft: Omit<InvoiceIssuedPayload, "sequence" | "number" | "billingEntity">,
    correlationId: string | undefined,
  ): Invoice {
    const stream = entityStream(billingEntity);
    const current = this._events.streamVersion(stream);
    const sequence = current + 1;
    const payload: InvoiceIssuedPayload = {
      ...draft,
      billingEntity,
      sequence,
      number: `${this._prefix}-${String(sequence).padStart(6, "0")}`,
    };
    const event = createDomainEvent(INVOICE_ISSUED, "invoicing", payload, {
      timestamp: draft.issuedAt,
      ...(correlationId !== undefined ? { correlationId } : {}),
    });

    try {
      this._events.append(stream, [event], {
        expectedVersion: current === 0 ? "no_stream" : current,
      });
    } catch (err) {
      if (err instanceof EventStoreError && err.code === "CONCURRENCY_CONFLICT") {
        throw new SequenceConflictError(billingEntity, sequence);
      }
      throw err;
    }

    const invoice = this._project(event);
    this._logger.info(
      { invoiceId: invoice.id, number: invoice.number, userRef: invoice.userRef, total: invoice.total },
      "Invoice issued",
    );
    return invoice;
  }

  private _transition(
    invoice: Invoice,
    to: InvoiceStatus,
    type: string,
    payload: Readonly<Record<string, unknown>>,
  ): Invoice {
    if (!VALID_TRANSITIONS[invoice.status].includes(to)) {
      throw new InvalidTransitionError("Invoice", invoice.status, to);
    }
    const stream = invoiceStream(invoice.id);
    const event = createDomainEvent(type, "invoicing", payload, {
      timestamp: this._clock.now().toISOString(),
    });
    this._events.append(stream, [event], { expectedVersion: this._events.streamVersion(stream) });
    return this._project(event);
  }

  private _project(event: DomainEvent): Invoice {
    const id = invoiceIdOf(event);
    const next = applyInvoiceEvent(this._invoices.get(id), event);
    this._invoices.set(id, next);
    return next;
  }
}
