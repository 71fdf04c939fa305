/**
 * Error taxonomy shared by every billing component.
 *
 * Each error carries a stable `code` that the HTTP layer maps to a status.
 * Subclasses exist so callers can branch with `instanceof` on the cases
 * they handle (retry a sequence conflict, skip a duplicate, dun a failed
 * charge) without parsing messages.
 */

import type { Period } from "./billing.js";

export type BillingErrorCode =
  | "VALIDATION_FAILED"
  | "CURRENCY_MISMATCH"
  | "INVALID_AMOUNT"
  | "UNAUTHENTICATED_WEBHOOK"
  | "PROVIDER_TRANSIENT"
  | "PROVIDER_PERMANENT"
  | "CONFIG_MISSING"
  | "IMMUTABLE_PERIOD"
  | "SEQUENCE_CONFLICT"
  | "NOT_FOUND"
  | "INVALID_TRANSITION";

export class BillingError extends Error {
  constructor(
    public readonly code: BillingErrorCode,
    message: string,
    public readonly details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "BillingError";
  }
}

/** Malformed input, rejected before anything is persisted. */
export class ValidationError extends BillingError {
  constructor(
    message: string,
    code: "VALIDATION_FAILED" | "CURRENCY_MISMATCH" | "INVALID_AMOUNT" = "VALIDATION_FAILED",
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(code, message, details);
    this.name = "ValidationError";
  }
}

/** Webhook signature, token or certificate check failed. */
export class UnauthenticatedWebhookError extends BillingError {
  constructor(
    public readonly provider: string,
    reason: string,
  ) {
    super("UNAUTHENTICATED_WEBHOOK", `Webhook from "${provider}" failed authentication: ${reason}`);
    this.name = "UnauthenticatedWebhookError";
  }
}

/**
 * Failure talking to a payment provider.
 *
 * - transient: timeout, network error, 5xx; safe to retry
 * - permanent: declined (insufficient funds, invalid account, fraud block)
 */
export class ProviderError extends BillingError {
  constructor(
    public readonly provider: string,
    public readonly kind: "transient" | "permanent",
    public readonly reason: string,
  ) {
    super(
      kind === "transient" ? "PROVIDER_TRANSIENT" : "PROVIDER_PERMANENT",
      `Provider "${provider}" ${kind} failure: ${reason}`,
    );
    this.name = "ProviderError";
  }
}

/** No configuration entry is in force for the requested key and date. */
export class ConfigMissingError extends BillingError {
  constructor(
    public readonly configType: string,
    public readonly key: string,
    public readonly asOf: string,
  ) {
    super("CONFIG_MISSING", `No "${configType}" configuration for key "${key}" effective at ${asOf}`, {
      configType,
      key,
      asOf,
    });
    this.name = "ConfigMissingError";
  }
}

/** Royalties for an (author, period) that already has paid records. */
export class ImmutablePeriodError extends BillingError {
  constructor(
    public readonly authorRef: string,
    public readonly period: Period,
  ) {
    super(
      "IMMUTABLE_PERIOD",
      `Royalties for author "${authorRef}" in [${period.start}, ${period.end}) are already paid`,
      { authorRef, period },
    );
    this.name = "ImmutablePeriodError";
  }
}

/** Another writer took the next invoice number first; retry allocation. */
export class SequenceConflictError extends BillingError {
  constructor(
    public readonly billingEntity: string,
    public readonly expectedSequence: number,
  ) {
    super(
      "SEQUENCE_CONFLICT",
      `Invoice sequence ${expectedSequence} for "${billingEntity}" was taken concurrently`,
    );
    this.name = "SequenceConflictError";
  }
}

export class NotFoundError extends BillingError {
  constructor(
    public readonly resourceType: string,
    public readonly resourceId: string,
  ) {
    super("NOT_FOUND", `${resourceType} "${resourceId}" not found`, { resourceType, resourceId });
    this.name = "NotFoundError";
  }
}

export class InvalidTransitionError extends BillingError {
  constructor(
    public readonly resourceType: string,
    public readonly from: string,
    public readonly to: string,
  ) {
    super("INVALID_TRANSITION", `Cannot transition ${resourceType} from "${from}" to "${to}"`, {
      from,
      to,
    });
    this.name = "InvalidTransitionError";
  }
}
