/**
 * @quire/invoicing — Invoice events.
 *
 * Streams:
 * - `invoices-<billingEntity>`: one `invoice.issued` per invoice; the
 *   stream version is the invoice's sequence number
 * - `invoice-<id>`: every later transition of that invoice
 */

import { z } from "zod";
import type { EventSchema } from "@quire/event-store";
import { CurrencySchema, InvoiceItemSchema, MoneySchema } from "@quire/types";

export const INVOICE_ISSUED = "invoice.issued";
export const INVOICE_PAID = "invoice.paid";
export const INVOICE_OVERDUE = "invoice.overdue";
export const INVOICE_VOIDED = "invoice.voided";

export function entityStream(billingEntity: string): string {
  return `invoices-${billingEntity}`;
}

export function invoiceStream(invoiceId: string): string {
  return `invoice-${invoiceId}`;
}

// ─── Payloads ────────────────────────────────────────────────────────────

export const InvoiceIssuedPayloadSchema = z.object({
  id: z.string().min(1),
  billingEntity: z.string().min(1),
  sequence: z.number().int().positive(),
  number: z.string().min(1),
  userRef: z.string().min(1),
  items: z.array(InvoiceItemSchema).min(1),
  currency: CurrencySchema,
  total: MoneySchema,
  subscriptionId: z.string().optional(),
  issuedAt: z.string(),
  dueAt: z.string(),
});

export const InvoicePaidPayloadSchema = z.object({
  invoiceId: z.string(),
  paidAt: z.string(),
  amountPaid: MoneySchema,
  transactionIds: z.array(z.string()),
});

export const InvoiceOverduePayloadSchema = z.object({
  invoiceId: z.string(),
  dueAt: z.string(),
  markedAt: z.string(),
});

export const InvoiceVoidedPayloadSchema = z.object({
  invoiceId: z.string(),
  reason: z.string().min(1),
  voidedAt: z.string(),
});

export type InvoiceIssuedPayload = z.infer<typeof InvoiceIssuedPayloadSchema>;
export type InvoicePaidPayload = z.infer<typeof InvoicePaidPayloadSchema>;
export type InvoiceOverduePayload = z.infer<typeof InvoiceOverduePayloadSchema>;
export type InvoiceVoidedPayload = z.infer<typeof InvoiceVoidedPayloadSchema>;

export const INVOICE_EVENT_SCHEMAS: readonly EventSchema[] = [
  {
    type: INVOICE_ISSUED,
    version: 1,
    description: "An invoice was numbered and issued",
    source: "invoicing",
    validate: (p) => InvoiceIssuedPayloadSchema.safeParse(p).success,
  },
  {
    type: INVOICE_PAID,
    version: 1,
    description: "Settled payments covered an invoice's total",
    source: "invoicing",
    validate: (p) => InvoicePaidPayloadSchema.safeParse(p).success,
  },
  {
    type: INVOICE_OVERDUE,
    version: 1,
    description: "An issued invoice passed its due date unpaid",
    source: "invoicing",
    validate: (p) => InvoiceOverduePayloadSchema.safeParse(p).success,
  },
  {
    type: INVOICE_VOIDED,
    version: 1,
    description: "An invoice was voided",
    source: "invoicing",
    validate: (p) => InvoiceVoidedPayloadSchema.safeParse(p).success,
  },
];
