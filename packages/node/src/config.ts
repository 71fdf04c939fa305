/**
 * @quire/node — Process configuration.
 *
 * Loads and validates environment variables with Zod. Only process-level
 * settings live here: listen address, logging, persistence and provider
 * credentials. Rates, thresholds and schedules belong to the versioned
 * BillingConfigStore.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === "" ? undefined : v));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Persistence (in-memory when unset)
  DATA_DIR: optionalString,

  // Invoicing
  BILLING_ENTITY: z.string().min(1).default("default"),
  INVOICE_NUMBER_PREFIX: z
    .string()
    .regex(/^[A-Z0-9-]{1,12}$/, "must be 1-12 uppercase letters, digits or dashes")
    .default("INV"),

  // Card processor
  CARD_WEBHOOK_SECRET: optionalString,
  CARD_API_KEY: optionalString,
  CARD_API_URL: z.string().url().default("https://api.card.invalid"),

  // Mobile money operator A (shared-token callbacks)
  MOMO_A_WEBHOOK_TOKEN: optionalString,
  MOMO_A_API_KEY: optionalString,
  MOMO_A_API_URL: z.string().url().default("https://api.momo-a.invalid"),

  // Mobile money operator B (signed callbacks)
  MOMO_B_PUBLIC_KEY_PEM: optionalString,
  MOMO_B_API_KEY: optionalString,
  MOMO_B_API_URL: z.string().url().default("https://api.momo-b.invalid"),

  // Scheduling
  TICK_INTERVAL_MS: z.coerce.number().int().min(1000).default(60000),
  WEBHOOK_TOLERANCE_SECONDS: z.coerce.number().int().min(1).max(3600).default(300),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
