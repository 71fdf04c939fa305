/**
 * Zod schemas for shared value types.
 *
 * Used to parse event payloads on replay and request bodies at the HTTP
 * edge, so values re-entering the process are checked rather than cast.
 */

import { z } from "zod";
import type { Currency } from "./money.js";

export const CurrencySchema = z.enum(["EUR", "USD", "XOF", "XAF"]) satisfies z.ZodType<Currency>;

export const MinorAmountSchema = z.string().regex(/^-?\d+$/, "must be an integer amount of minor units");

export const MoneySchema = z.object({
  amountMinor: MinorAmountSchema,
  currency: CurrencySchema,
});

/** Non-negative decimal rate string, at most 1 */
export const RateSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "must be a decimal string")
  .refine((v) => Number(v) <= 1, "must be at most 1");

export const RoundingModeSchema = z.enum(["half_even", "half_up"]);

export const IsoDateSchema = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), "must be an ISO 8601 date");

export const PeriodSchema = z
  .object({ start: IsoDateSchema, end: IsoDateSchema })
  .refine((p) => Date.parse(p.start) < Date.parse(p.end), "start must precede end");

export const InvoiceItemSchema = z.object({
  description: z.string().min(1),
  quantity: z.number().int().positive(),
  unitPrice: MoneySchema,
  itemType: z.enum(["subscription", "book_purchase", "premium_upgrade", "tip", "tax", "discount"]),
});

export const PaymentMethodSchema = z.object({
  provider: z.enum(["card", "mobile_money_a", "mobile_money_b"]),
  accountRef: z.string().min(1),
});

export const RevenueTypeSchema = z.enum(["direct_sale", "subscription_read", "tip"]);
