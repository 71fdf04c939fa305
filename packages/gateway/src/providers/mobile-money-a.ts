/**
 * Mobile-money operator A adapter.
 *
 * Wire format:
 * - Amounts are major-unit decimal strings ("5000", "12.50")
 * - Notifications carry a shared token in `X-Notification-Token`,
 *   compared in constant time
 * - Statuses: PENDING, SUCCESS, FAILED, REFUNDED
 */

import { z } from "zod";
import { ProviderError, UnauthenticatedWebhookError } from "@quire/types";
import { formatMajor, parseMajor } from "@quire/ledger";
import { ProviderHttpClient } from "../http.js";
import type { FetchFn } from "../http.js";
import type { ChargeOutcome, ChargeRequest, NormalizedPaymentEvent, PaymentProvider } from "../types.js";
import { declined, parseApiBody, parseWebhookBody, safeEqual, toCurrency } from "./common.js";

export interface MobileMoneyAProviderOptions {
  readonly apiUrl: string;
  readonly apiKey: string;
  readonly webhookToken: string;
  readonly fetchFn?: FetchFn;
  readonly timeoutMs?: number;
}

const CollectionSchema = z.object({
  transactionId: z.string().min(1),
  status: z.enum(["PENDING", "SUCCESS", "FAILED"]),
  reason: z.string().optional(),
});

const ErrorSchema = z.object({ code: z.string().optional() });

const NotificationSchema = z.object({
  transactionId: z.string().min(1),
  reference: z.string().min(1),
  status: z.string(),
  amount: z.string(),
  currency: z.string(),
  timestamp: z.string().refine((v) => !Number.isNaN(Date.parse(v)), "must be an ISO 8601 date"),
  reason: z.string().optional(),
  refundId: z.string().optional(),
  metadata: z.record(z.string()).optional(),
});

export class MobileMoneyAProvider implements PaymentProvider {
  readonly id = "mobile_money_a" as const;

  private readonly _http: ProviderHttpClient;
  private readonly _webhookToken: string;

  constructor(options: MobileMoneyAProviderOptions) {
    this._http = new ProviderHttpClient({
      provider: this.id,
      baseUrl: options.apiUrl,
      headers: { "X-Api-Key": options.apiKey },
      ...(options.fetchFn !== undefined ? { fetchFn: options.fetchFn } : {}),
      ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
    });
    this._webhookToken = options.webhookToken;
  }

  async initiateCharge(request: ChargeRequest): Promise<ChargeOutcome> {
    const response = await this._http.post("/collections", {
      reference: request.reference,
      amount: formatMajor(request.amount),
      currency: request.amount.currency,
      msisdn: request.paymentMethod.accountRef,
      description: request.description,
      metadata: request.metadata ?? {},
    });

    // 422 is the operator's decline answer
    if (response.status === 422) {
      return declined(parseApiBody(this.id, response, ErrorSchema).code);
    }
    if (response.status >= 400) {
      throw new ProviderError(this.id, "permanent", `collection rejected with HTTP ${response.status}`);
    }
    return toOutcome(parseApiBody(this.id, response, CollectionSchema));
  }

  async getChargeStatus(reference: string): Promise<ChargeOutcome | null> {
    const response = await this._http.get(`/collections/${encodeURIComponent(reference)}`);
    if (response.status === 404) {
      return null;
    }
    if (response.status >= 400) {
      throw new ProviderError(this.id, "permanent", `status lookup rejected with HTTP ${response.status}`);
    }
    return toOutcome(parseApiBody(this.id, response, CollectionSchema));
  }

  verifyWebhookSignature(_rawPayload: string, signatureHeader: string | undefined): void {
    if (signatureHeader === undefined || signatureHeader.length === 0) {
      throw new UnauthenticatedWebhookError(this.id, "missing notification token");
    }
    if (!safeEqual(signatureHeader, this._webhookToken)) {
      throw new UnauthenticatedWebhookError(this.id, "notification token mismatch");
    }
  }

  normalizeWebhookPayload(rawPayload: string): NormalizedPaymentEvent | null {
    const n = parseWebhookBody(this.id, rawPayload, NotificationSchema);
    const base = {
      provider: this.id,
      reference: n.reference,
      occurredAt: new Date(n.timestamp).toISOString(),
      amount: parseMajor(n.amount, toCurrency(this.id, n.currency)),
      metadata: { ...n.metadata },
    };

    switch (n.status) {
      case "SUCCESS":
        return { ...base, providerTransactionId: n.transactionId, kind: "charge", status: "settled" };
      case "FAILED":
        return {
          ...base,
          providerTransactionId: n.transactionId,
          kind: "charge",
          status: "failed",
          failureReason: n.reason ?? "declined",
        };
      case "REFUNDED":
        return {
          ...base,
          providerTransactionId: n.refundId ?? `${n.transactionId}:refund`,
          kind: "refund",
          status: "settled",
          metadata: { ...base.metadata, refundedChargeId: n.transactionId },
        };
      default:
        return null;
    }
  }
}

function toOutcome(collection: z.output<typeof CollectionSchema>): ChargeOutcome {
  switch (collection.status) {
    case "SUCCESS":
      return { status: "settled", providerTransactionId: collection.transactionId };
    case "PENDING":
      return { status: "pending", providerTransactionId: collection.transactionId };
    case "FAILED":
      return declined(collection.reason, collection.transactionId);
  }
}
