/**
 * @quire/config — Versioned, typed billing configuration.
 *
 * Rates, thresholds, retry schedules and rounding rules are data with an
 * effective date, never constants. Historical computations resolve the
 * value that was in force at their own date.
 *
 * @packageDocumentation
 */

export type { ConfigType, ConfigValues, RetryPolicy, PaymentTerms } from "./kinds.js";
export { CONFIG_TYPES, VALUE_SCHEMAS, KEY_SCHEMAS, isConfigType } from "./kinds.js";

export { BillingConfigStore, CONFIG_STREAM, CONFIG_SET, CONFIG_EVENT_SCHEMAS } from "./config-store.js";
export type { BillingConfigStoreOptions, ConfigEntry, ConfigSnapshot } from "./config-store.js";

export { DEFAULT_CONFIGURATION, applyDefaults } from "./defaults.js";
