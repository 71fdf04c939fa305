/**
 * Global error handler middleware.
 *
 * Catches all errors thrown by route handlers and produces
 * a consistent error envelope response.
 *
 * Maps billing and event-store error codes to HTTP status codes.
 * Unknown errors become 500 without their message.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";
import { BillingError, ProviderError } from "@quire/types";
import { EventStoreError } from "@quire/event-store";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

// =============================================================================
// Domain Error → HTTP Status Mapping
// =============================================================================

const STATUS_MAP: Readonly<Record<string, ContentfulStatusCode>> = {
  // Input
  VALIDATION_FAILED: 400,
  CURRENCY_MISMATCH: 400,
  INVALID_AMOUNT: 400,

  // Webhook authentication
  UNAUTHENTICATED_WEBHOOK: 401,

  // Lookups
  NOT_FOUND: 404,

  // State conflicts
  INVALID_TRANSITION: 409,
  IMMUTABLE_PERIOD: 409,
  SEQUENCE_CONFLICT: 409,
  CONCURRENCY_CONFLICT: 409,

  // Configuration
  CONFIG_MISSING: 500,
};

function publicMessage(code: string): string {
  return code === "PAYMENT_FAILED" ? "Payment failed" : "Internal server error";
}

function describe(err: Error): { code: string; status: ContentfulStatusCode; details?: Record<string, unknown> } {
  // Provider details (decline codes, upstream statuses) stay in the logs.
  if (err instanceof ProviderError) {
    return { code: "PAYMENT_FAILED", status: err.kind === "transient" ? 503 : 502 };
  }
  if (err instanceof BillingError) {
    const status = STATUS_MAP[err.code] ?? 500;
    return err.details !== undefined
      ? { code: err.code, status, details: { ...err.details } }
      : { code: err.code, status };
  }
  if (err instanceof EventStoreError) {
    return { code: err.code, status: STATUS_MAP[err.code] ?? 500 };
  }
  return { code: "INTERNAL_ERROR", status: 500 };
}

// =============================================================================
// Middleware
// =============================================================================

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context<AppEnv>): Response {
  const { code, status, details } = describe(err);

  if (status >= 500) {
    c.get("logger").error({ err, code }, "Request failed");
    // Internal messages never leave the process.
    return c.json(createErrorEnvelope(code, publicMessage(code)), status);
  }

  return c.json(createErrorEnvelope(code, err.message, details), status);
}
