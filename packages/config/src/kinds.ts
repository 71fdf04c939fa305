/**
 * @quire/config — Configuration kinds.
 *
 * Every business parameter the engine reads is one of these kinds. Each
 * kind fixes the shape of its keys and values; a rate can never be read
 * as a threshold.
 *
 * | configType         | key                                      | value                         |
 * | ------------------ | ---------------------------------------- | ----------------------------- |
 * | royalty_rate       | direct_sale / subscription_read / tip    | decimal rate in [0, 1]        |
 * | payout_threshold   | currency                                 | Money in that currency        |
 * | tax_rate           | ISO country code or "default"            | decimal rate in [0, 1]        |
 * | retry_policy       | "default"                                | delays (days) + max retries   |
 * | rounding_mode      | royalty / tax                            | half_even / half_up           |
 * | payment_terms      | "default"                                | days until an invoice is due  |
 * | currencies         | "supported"                              | accepted invoice currencies   |
 */

import { z } from "zod";
import type { Currency, Money, RoundingMode } from "@quire/types";
import {
  CurrencySchema,
  MoneySchema,
  RateSchema,
  RevenueTypeSchema,
  RoundingModeSchema,
} from "@quire/types";

// =============================================================================
// Value types
// =============================================================================

export interface RetryPolicy {
  /** Delay before retry n is `retryDelaysDays[n-1]`; the last delay repeats */
  readonly retryDelaysDays: readonly number[];

  /** Retries after the initial attempt before the subscription is cancelled */
  readonly maxRetries: number;
}

export interface PaymentTerms {
  readonly dueDays: number;
}

/** Value type per configuration kind */
export interface ConfigValues {
  royalty_rate: string;
  payout_threshold: Money;
  tax_rate: string;
  retry_policy: RetryPolicy;
  rounding_mode: RoundingMode;
  payment_terms: PaymentTerms;
  currencies: readonly Currency[];
}

export type ConfigType = keyof ConfigValues;

export const CONFIG_TYPES: readonly ConfigType[] = [
  "royalty_rate",
  "payout_threshold",
  "tax_rate",
  "retry_policy",
  "rounding_mode",
  "payment_terms",
  "currencies",
];

// =============================================================================
// Schemas
// =============================================================================

const RetryPolicySchema = z.object({
  retryDelaysDays: z.array(z.number().int().min(0)).min(1),
  maxRetries: z.number().int().min(0),
});

export const VALUE_SCHEMAS: {
  readonly [K in ConfigType]: z.ZodType<ConfigValues[K], z.ZodTypeDef, unknown>;
} = {
  royalty_rate: RateSchema,
  payout_threshold: MoneySchema,
  tax_rate: RateSchema,
  retry_policy: RetryPolicySchema,
  rounding_mode: RoundingModeSchema,
  payment_terms: z.object({ dueDays: z.number().int().min(0).max(365) }),
  currencies: z.array(CurrencySchema).min(1),
};

export const KEY_SCHEMAS: { readonly [K in ConfigType]: z.ZodType<string, z.ZodTypeDef, unknown> } = {
  royalty_rate: RevenueTypeSchema,
  payout_threshold: CurrencySchema,
  tax_rate: z.string().regex(/^([A-Z]{2}|default)$/, 'must be an ISO country code or "default"'),
  retry_policy: z.literal("default"),
  rounding_mode: z.enum(["royalty", "tax"]),
  payment_terms: z.literal("default"),
  currencies: z.literal("supported"),
};

const CONFIG_TYPE_SET = new Set<string>(CONFIG_TYPES);

export function isConfigType(value: unknown): value is ConfigType {
  return typeof value === "string" && CONFIG_TYPE_SET.has(value);
}
