/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type.
 * Route handlers use these for body/query validation.
 */

import { z } from "zod";
import type { ConfigType } from "@quire/config";
import { VALUE_SCHEMAS } from "@quire/config";
import {
  CurrencySchema,
  InvoiceItemSchema,
  IsoDateSchema,
  MoneySchema,
  PeriodSchema,
} from "@quire/types";
import { CreateSubscriptionInputSchema } from "@quire/subscriptions";

// =============================================================================
// Invoice DTOs
// =============================================================================

export const CreateInvoiceSchema = z.object({
  userRef: z.string().min(1).max(128),
  currency: CurrencySchema,
  items: z.array(InvoiceItemSchema).min(1).max(100),
  subscriptionId: z.string().min(1).optional(),
  /** Adds a tax line at this country's configured rate */
  taxCountry: z.string().regex(/^[A-Z]{2}$/).optional(),
  dueAt: IsoDateSchema.optional(),
});

export type CreateInvoiceDto = z.infer<typeof CreateInvoiceSchema>;

export const ListInvoicesQuerySchema = z.object({
  userRef: z.string().min(1).optional(),
  status: z.enum(["draft", "issued", "paid", "overdue", "void"]).optional(),
});

export type ListInvoicesQuery = z.infer<typeof ListInvoicesQuerySchema>;

export const VoidInvoiceSchema = z.object({
  reason: z.string().min(1).max(1024),
});

export type VoidInvoiceDto = z.infer<typeof VoidInvoiceSchema>;

// =============================================================================
// Subscription DTOs
// =============================================================================

export const CreateSubscriptionSchema = CreateSubscriptionInputSchema;

export type CreateSubscriptionDto = z.infer<typeof CreateSubscriptionSchema>;

export const CancelSubscriptionSchema = z.object({
  reason: z.string().min(1).max(1024),
});

export type CancelSubscriptionDto = z.infer<typeof CancelSubscriptionSchema>;

// =============================================================================
// Royalty DTOs
// =============================================================================

export const RoyaltySummaryQuerySchema = z
  .object({
    authorRef: z.string().min(1),
    start: IsoDateSchema,
    end: IsoDateSchema,
  })
  .refine((q) => Date.parse(q.start) < Date.parse(q.end), "start must precede end");

export type RoyaltySummaryQuery = z.infer<typeof RoyaltySummaryQuerySchema>;

export const ComputeRoyaltiesSchema = z.object({
  period: PeriodSchema,
  authorRef: z.string().min(1).optional(),
});

export type ComputeRoyaltiesDto = z.infer<typeof ComputeRoyaltiesSchema>;

export const RoyaltyCorrectionSchema = z.object({
  adjustment: MoneySchema,
  reason: z.string().min(1).max(1024),
});

export type RoyaltyCorrectionDto = z.infer<typeof RoyaltyCorrectionSchema>;

export const MarkRoyaltiesPaidSchema = z.object({
  authorRef: z.string().min(1),
  period: PeriodSchema,
  payoutTransactionId: z.string().min(1),
});

export type MarkRoyaltiesPaidDto = z.infer<typeof MarkRoyaltiesPaidSchema>;

// =============================================================================
// Configuration DTOs
// =============================================================================

function configEntry<T extends ConfigType>(configType: T) {
  return z.object({
    configType: z.literal(configType),
    key: z.string().min(1),
    value: VALUE_SCHEMAS[configType],
    effectiveFrom: IsoDateSchema,
  });
}

export const SetConfigSchema = z.discriminatedUnion("configType", [
  configEntry("royalty_rate"),
  configEntry("payout_threshold"),
  configEntry("tax_rate"),
  configEntry("retry_policy"),
  configEntry("rounding_mode"),
  configEntry("payment_terms"),
  configEntry("currencies"),
]);

export type SetConfigDto = z.infer<typeof SetConfigSchema>;
