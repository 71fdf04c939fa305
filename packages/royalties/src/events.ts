/**
 * @quire/royalties — Royalty events.
 *
 * One stream per author (`royalties-<authorRef>`):
 * - `royalty.computed`: a batch for one (author, period); replaces that
 *   period's unpaid records and may promote carried accruals to payable
 * - `royalty.corrected`: a correction record referencing an earlier one
 * - `royalty.paid`: payable records settled by a payout transaction
 */

import { z } from "zod";
import type { EventSchema } from "@quire/event-store";
import { IsoDateSchema, MoneySchema, PeriodSchema, RateSchema, RevenueTypeSchema } from "@quire/types";

export const ROYALTY_COMPUTED = "royalty.computed";
export const ROYALTY_CORRECTED = "royalty.corrected";
export const ROYALTY_PAID = "royalty.paid";

export function authorStream(authorRef: string): string {
  return `royalties-${authorRef}`;
}

// ─── Payloads ────────────────────────────────────────────────────────────

export const AuthorRoyaltySchema = z.object({
  id: z.string().min(1),
  authorRef: z.string().min(1),
  period: PeriodSchema,
  revenueType: RevenueTypeSchema,
  grossBase: MoneySchema,
  rateApplied: RateSchema,
  payableAmount: MoneySchema,
  status: z.enum(["accrued", "payable", "paid"]),
  sourceTransactionRefs: z.array(z.string()),
  correctsRoyaltyId: z.string().optional(),
  correctionReason: z.string().optional(),
  computedAt: IsoDateSchema,
  paidAt: IsoDateSchema.optional(),
  payoutTransactionId: z.string().optional(),
});

export const RoyaltyComputedPayloadSchema = z.object({
  authorRef: z.string().min(1),
  period: PeriodSchema,
  records: z.array(AuthorRoyaltySchema),
  supersededIds: z.array(z.string()),
  promotedIds: z.array(z.string()),
  computedAt: IsoDateSchema,
});

export const RoyaltyCorrectedPayloadSchema = z.object({
  authorRef: z.string().min(1),
  record: AuthorRoyaltySchema,
});

export const RoyaltyPaidPayloadSchema = z.object({
  authorRef: z.string().min(1),
  royaltyIds: z.array(z.string()).min(1),
  payoutTransactionId: z.string().min(1),
  paidAt: IsoDateSchema,
});

export type RoyaltyComputedPayload = z.infer<typeof RoyaltyComputedPayloadSchema>;
export type RoyaltyCorrectedPayload = z.infer<typeof RoyaltyCorrectedPayloadSchema>;
export type RoyaltyPaidPayload = z.infer<typeof RoyaltyPaidPayloadSchema>;

export const ROYALTY_EVENT_SCHEMAS: readonly EventSchema[] = [
  {
    type: ROYALTY_COMPUTED,
    version: 1,
    description: "Royalties were computed for an author and period",
    source: "royalties",
    validate: (p) => RoyaltyComputedPayloadSchema.safeParse(p).success,
  },
  {
    type: ROYALTY_CORRECTED,
    version: 1,
    description: "A correction was recorded against a royalty",
    source: "royalties",
    validate: (p) => RoyaltyCorrectedPayloadSchema.safeParse(p).success,
  },
  {
    type: ROYALTY_PAID,
    version: 1,
    description: "Payable royalties were paid out",
    source: "royalties",
    validate: (p) => RoyaltyPaidPayloadSchema.safeParse(p).success,
  },
];
