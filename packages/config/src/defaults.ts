/**
 * @quire/config — Baseline configuration for a fresh deployment.
 */

import type { BillingConfigStore } from "./config-store.js";
import type { ConfigType, ConfigValues } from "./kinds.js";

type DefaultEntry = {
  [K in ConfigType]: { readonly configType: K; readonly key: string; readonly value: ConfigValues[K] };
}[ConfigType];

export const DEFAULT_CONFIGURATION: readonly DefaultEntry[] = [
  { configType: "royalty_rate", key: "direct_sale", value: "0.70" },
  { configType: "royalty_rate", key: "subscription_read", value: "0.50" },
  { configType: "royalty_rate", key: "tip", value: "0.90" },
  { configType: "payout_threshold", key: "EUR", value: { amountMinor: "5000", currency: "EUR" } },
  { configType: "payout_threshold", key: "USD", value: { amountMinor: "5000", currency: "USD" } },
  { configType: "payout_threshold", key: "XOF", value: { amountMinor: "25000", currency: "XOF" } },
  { configType: "payout_threshold", key: "XAF", value: { amountMinor: "25000", currency: "XAF" } },
  { configType: "tax_rate", key: "default", value: "0" },
  { configType: "retry_policy", key: "default", value: { retryDelaysDays: [1, 3, 7], maxRetries: 3 } },
  { configType: "rounding_mode", key: "royalty", value: "half_even" },
  { configType: "rounding_mode", key: "tax", value: "half_up" },
  { configType: "payment_terms", key: "default", value: { dueDays: 14 } },
  { configType: "currencies", key: "supported", value: ["EUR", "USD", "XOF", "XAF"] },
];

/**
 * Record every default whose key has no history yet. Existing keys are
 * left alone, so this is safe to run on every start.
 *
 * @returns number of entries written
 */
export function applyDefaults(store: BillingConfigStore, effectiveFrom: string | Date): number {
  let written = 0;
  for (const entry of DEFAULT_CONFIGURATION) {
    if (store.history(entry.configType, entry.key).length > 0) {
      continue;
    }
    store.setConfig(entry.configType, entry.key, entry.value, effectiveFrom);
    written++;
  }
  return written;
}

