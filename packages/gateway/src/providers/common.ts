/**
 * Helpers shared by provider adapters.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import type { z } from "zod";
import type { Currency } from "@quire/types";
import { CurrencySchema, ProviderError, ValidationError } from "@quire/types";
import type { ChargeOutcome, DeclineReason } from "../types.js";
import type { ProviderResponse } from "../http.js";

/**
 * Constant-time string comparison. Both sides are hashed first so the
 * comparison length does not depend on the secret.
 */
export function safeEqual(a: string, b: string): boolean {
  const da = createHash("sha256").update(a).digest();
  const db = createHash("sha256").update(b).digest();
  return timingSafeEqual(da, db);
}

/** Parse a webhook body and check it against the provider's schema. */
export function parseWebhookBody<S extends z.ZodTypeAny>(
  provider: string,
  rawPayload: string,
  schema: S,
): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(rawPayload);
  } catch {
    throw new ValidationError(`Webhook from "${provider}" is not valid JSON`);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError(`Webhook from "${provider}" has an unexpected shape`, "VALIDATION_FAILED", {
      issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
    });
  }
  return parsed.data;
}

/** Parse a 2xx API response; anything else is a permanent provider error. */
export function parseApiBody<S extends z.ZodTypeAny>(
  provider: string,
  response: ProviderResponse,
  schema: S,
): z.output<S> {
  const parsed = schema.safeParse(response.body);
  if (!parsed.success) {
    throw new ProviderError(provider, "permanent", `unexpected response body (HTTP ${response.status})`);
  }
  return parsed.data;
}

const DECLINE_CODES: Readonly<Record<string, DeclineReason>> = {
  insufficient_funds: "insufficient_funds",
  INSUFFICIENT_FUNDS: "insufficient_funds",
  NOT_ENOUGH_FUNDS: "insufficient_funds",
  invalid_account: "invalid_account",
  INVALID_ACCOUNT: "invalid_account",
  PAYER_NOT_FOUND: "invalid_account",
  fraudulent: "fraud_block",
  FRAUD_BLOCK: "fraud_block",
  RISK_REJECTED: "fraud_block",
};

/** Map a provider decline code onto the engine's decline vocabulary. */
export function classifyDecline(code: string | undefined): DeclineReason {
  return (code !== undefined ? DECLINE_CODES[code] : undefined) ?? "declined";
}

/** A declined charge, as reported by a 4xx decline response. */
export function declined(code: string | undefined, providerTransactionId?: string): ChargeOutcome {
  return {
    status: "failed",
    failureReason: classifyDecline(code),
    ...(providerTransactionId !== undefined ? { providerTransactionId } : {}),
  };
}

/** Provider currency code (any case) → supported Currency. */
export function toCurrency(provider: string, code: string): Currency {
  const parsed = CurrencySchema.safeParse(code.toUpperCase());
  if (!parsed.success) {
    throw new ValidationError(`Webhook from "${provider}" uses unsupported currency "${code}"`);
  }
  return parsed.data;
}
