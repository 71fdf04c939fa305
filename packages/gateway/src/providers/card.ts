/**
 * Card processor adapter.
 *
 * Wire format:
 * - Amounts are integer minor units, currencies lowercase ISO codes
 * - Webhooks are signed: `Signature: t=<unix>,v1=<hex>` where
 *   v1 = HMAC-SHA256(secret, "<t>.<raw body>")
 * - Notifications older or newer than the tolerance window are rejected
 */

import { createHmac } from "node:crypto";
import { z } from "zod";
import type { Clock } from "@quire/types";
import { ProviderError, UnauthenticatedWebhookError, ValidationError, systemClock } from "@quire/types";
import { money } from "@quire/ledger";
import { ProviderHttpClient } from "../http.js";
import type { FetchFn } from "../http.js";
import type { ChargeOutcome, ChargeRequest, NormalizedPaymentEvent, PaymentProvider } from "../types.js";
import { declined, parseApiBody, parseWebhookBody, safeEqual, toCurrency } from "./common.js";

export interface CardProviderOptions {
  readonly apiUrl: string;
  readonly apiKey: string;
  readonly webhookSecret: string;
  /** Default: 300 */
  readonly toleranceSeconds?: number;
  readonly clock?: Clock;
  readonly fetchFn?: FetchFn;
  readonly timeoutMs?: number;
}

// ─── Wire schemas ────────────────────────────────────────────────────────

const ChargeSchema = z.object({
  id: z.string().min(1),
  status: z.enum(["succeeded", "pending", "failed"]),
  failure_code: z.string().nullish(),
});

const DeclineSchema = z.object({
  error: z.object({
    code: z.string().optional(),
    decline_code: z.string().optional(),
    charge: z.string().optional(),
  }),
});

const WebhookSchema = z.object({
  id: z.string(),
  type: z.string(),
  created: z.number().int().nonnegative(),
  data: z.object({
    object: z.object({
      id: z.string().min(1),
      amount: z.number().int().nonnegative(),
      currency: z.string(),
      reference: z.string().min(1),
      failure_code: z.string().nullish(),
      metadata: z.record(z.string()).optional(),
      refund: z.object({ id: z.string().min(1), amount: z.number().int().nonnegative() }).optional(),
    }),
  }),
});

// ─── Adapter ─────────────────────────────────────────────────────────────

export class CardProvider implements PaymentProvider {
  readonly id = "card" as const;

  private readonly _http: ProviderHttpClient;
  private readonly _webhookSecret: string;
  private readonly _toleranceSeconds: number;
  private readonly _clock: Clock;

  constructor(options: CardProviderOptions) {
    this._http = new ProviderHttpClient({
      provider: this.id,
      baseUrl: options.apiUrl,
      headers: { Authorization: `Bearer ${options.apiKey}` },
      ...(options.fetchFn !== undefined ? { fetchFn: options.fetchFn } : {}),
      ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
    });
    this._webhookSecret = options.webhookSecret;
    this._toleranceSeconds = options.toleranceSeconds ?? 300;
    this._clock = options.clock ?? systemClock;
  }

  async initiateCharge(request: ChargeRequest): Promise<ChargeOutcome> {
    const amount = Number(request.amount.amountMinor);
    if (!Number.isSafeInteger(amount)) {
      throw new ValidationError(`Amount ${request.amount.amountMinor} exceeds the card API range`);
    }

    const response = await this._http.post(
      "/v1/charges",
      {
        amount,
        currency: request.amount.currency.toLowerCase(),
        source: request.paymentMethod.accountRef,
        reference: request.reference,
        description: request.description,
        metadata: request.metadata ?? {},
      },
      { "Idempotency-Key": request.reference },
    );

    if (response.status === 402) {
      const body = parseApiBody(this.id, response, DeclineSchema);
      return declined(body.error.decline_code ?? body.error.code, body.error.charge);
    }
    if (response.status >= 400) {
      throw new ProviderError(this.id, "permanent", `charge rejected with HTTP ${response.status}`);
    }
    return toOutcome(parseApiBody(this.id, response, ChargeSchema));
  }

  async getChargeStatus(reference: string): Promise<ChargeOutcome | null> {
    const response = await this._http.get(`/v1/charges/by-reference/${encodeURIComponent(reference)}`);
    if (response.status === 404) {
      return null;
    }
    if (response.status >= 400) {
      throw new ProviderError(this.id, "permanent", `status lookup rejected with HTTP ${response.status}`);
    }
    return toOutcome(parseApiBody(this.id, response, ChargeSchema));
  }

  verifyWebhookSignature(rawPayload: string, signatureHeader: string | undefined): void {
    if (signatureHeader === undefined || signatureHeader.length === 0) {
      throw new UnauthenticatedWebhookError(this.id, "missing signature header");
    }

    let timestamp: string | undefined;
    const signatures: string[] = [];
    for (const part of signatureHeader.split(",")) {
      const [name, value] = part.trim().split("=", 2);
      if (name === "t") timestamp = value;
      else if (name === "v1" && value !== undefined) signatures.push(value);
    }

    if (timestamp === undefined || !/^\d+$/.test(timestamp) || signatures.length === 0) {
      throw new UnauthenticatedWebhookError(this.id, "malformed signature header");
    }

    const ageSeconds = Math.abs(this._clock.now().getTime() / 1000 - Number(timestamp));
    if (ageSeconds > this._toleranceSeconds) {
      throw new UnauthenticatedWebhookError(this.id, "timestamp outside tolerance window");
    }

    const expected = signCardPayload(this._webhookSecret, timestamp, rawPayload);
    if (!signatures.some((s) => safeEqual(s, expected))) {
      throw new UnauthenticatedWebhookError(this.id, "signature mismatch");
    }
  }

  normalizeWebhookPayload(rawPayload: string): NormalizedPaymentEvent | null {
    const event = parseWebhookBody(this.id, rawPayload, WebhookSchema);
    const charge = event.data.object;
    const currency = toCurrency(this.id, charge.currency);
    const occurredAt = new Date(event.created * 1000).toISOString();
    const base = {
      provider: this.id,
      reference: charge.reference,
      occurredAt,
      metadata: { ...charge.metadata, providerEventId: event.id },
    };

    switch (event.type) {
      case "charge.succeeded":
        return {
          ...base,
          providerTransactionId: charge.id,
          kind: "charge",
          status: "settled",
          amount: money(charge.amount, currency),
        };
      case "charge.failed":
        return {
          ...base,
          providerTransactionId: charge.id,
          kind: "charge",
          status: "failed",
          amount: money(charge.amount, currency),
          failureReason: charge.failure_code ?? "declined",
        };
      case "charge.refunded": {
        if (charge.refund === undefined) {
          throw new ValidationError(`Refund notification ${event.id} carries no refund object`);
        }
        return {
          ...base,
          providerTransactionId: charge.refund.id,
          kind: "refund",
          status: "settled",
          amount: money(charge.refund.amount, currency),
          metadata: { ...base.metadata, refundedChargeId: charge.id },
        };
      }
      default:
        return null;
    }
  }
}

/** Hex HMAC-SHA256 over `"<timestamp>.<payload>"`. */
export function signCardPayload(secret: string, timestamp: string, rawPayload: string): string {
  return createHmac("sha256", secret).update(`${timestamp}.${rawPayload}`).digest("hex");
}

function toOutcome(charge: z.output<typeof ChargeSchema>): ChargeOutcome {
  switch (charge.status) {
    case "succeeded":
      return { status: "settled", providerTransactionId: charge.id };
    case "pending":
      return { status: "pending", providerTransactionId: charge.id };
    case "failed":
      return declined(charge.failure_code ?? undefined, charge.id);
  }
}
