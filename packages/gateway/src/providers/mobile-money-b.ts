/**
 * Mobile-money operator B adapter.
 *
 * Wire format:
 * - Request-to-pay API keyed by `X-Reference-Id`
 * - Amounts are major-unit decimal strings
 * - Notifications are signed with the operator's RSA key:
 *   `X-Signature: base64(RSA-SHA256(raw body))`
 * - Statuses: PENDING, SUCCESSFUL, FAILED, REVERSED
 */

import { createVerify } from "node:crypto";
import { z } from "zod";
import { ProviderError, UnauthenticatedWebhookError } from "@quire/types";
import { formatMajor, parseMajor } from "@quire/ledger";
import { ProviderHttpClient } from "../http.js";
import type { FetchFn } from "../http.js";
import type { ChargeOutcome, ChargeRequest, NormalizedPaymentEvent, PaymentProvider } from "../types.js";
import { declined, parseApiBody, parseWebhookBody, toCurrency } from "./common.js";

export interface MobileMoneyBProviderOptions {
  readonly apiUrl: string;
  readonly apiKey: string;
  /** PEM public key or certificate of the operator's signing key */
  readonly publicKeyPem: string;
  readonly fetchFn?: FetchFn;
  readonly timeoutMs?: number;
}

const RequestToPaySchema = z.object({
  financialTransactionId: z.string().min(1).optional(),
  status: z.enum(["PENDING", "SUCCESSFUL", "FAILED"]),
  reason: z.string().optional(),
});

const ErrorSchema = z.object({ reason: z.string().optional() });

const CallbackSchema = z.object({
  financialTransactionId: z.string().min(1),
  externalId: z.string().min(1),
  status: z.string(),
  amount: z.string(),
  currency: z.string(),
  completedAt: z.string().refine((v) => !Number.isNaN(Date.parse(v)), "must be an ISO 8601 date"),
  reason: z.string().optional(),
  metadata: z.record(z.string()).optional(),
});

export class MobileMoneyBProvider implements PaymentProvider {
  readonly id = "mobile_money_b" as const;

  private readonly _http: ProviderHttpClient;
  private readonly _publicKeyPem: string;

  constructor(options: MobileMoneyBProviderOptions) {
    this._http = new ProviderHttpClient({
      provider: this.id,
      baseUrl: options.apiUrl,
      headers: { Authorization: `Bearer ${options.apiKey}` },
      ...(options.fetchFn !== undefined ? { fetchFn: options.fetchFn } : {}),
      ...(options.timeoutMs !== undefined ? { timeoutMs: options.timeoutMs } : {}),
    });
    this._publicKeyPem = options.publicKeyPem;
  }

  async initiateCharge(request: ChargeRequest): Promise<ChargeOutcome> {
    const response = await this._http.post(
      "/requesttopay",
      {
        amount: formatMajor(request.amount),
        currency: request.amount.currency,
        externalId: request.reference,
        payer: { partyIdType: "MSISDN", partyId: request.paymentMethod.accountRef },
        payerMessage: request.description,
        metadata: request.metadata ?? {},
      },
      { "X-Reference-Id": request.reference },
    );

    if (response.status === 409) {
      // Reference already submitted: the stored request is authoritative
      return (await this.getChargeStatus(request.reference)) ?? { status: "pending" };
    }
    if (response.status === 400 || response.status === 403) {
      return declined(parseApiBody(this.id, response, ErrorSchema).reason);
    }
    if (response.status >= 400) {
      throw new ProviderError(this.id, "permanent", `request-to-pay rejected with HTTP ${response.status}`);
    }
    return toOutcome(parseApiBody(this.id, response, RequestToPaySchema));
  }

  async getChargeStatus(reference: string): Promise<ChargeOutcome | null> {
    const response = await this._http.get(`/requesttopay/${encodeURIComponent(reference)}`);
    if (response.status === 404) {
      return null;
    }
    if (response.status >= 400) {
      throw new ProviderError(this.id, "permanent", `status lookup rejected with HTTP ${response.status}`);
    }
    return toOutcome(parseApiBody(this.id, response, RequestToPaySchema));
  }

  verifyWebhookSignature(rawPayload: string, signatureHeader: string | undefined): void {
    if (signatureHeader === undefined || signatureHeader.length === 0) {
      throw new UnauthenticatedWebhookError(this.id, "missing signature");
    }

    let valid: boolean;
    try {
      valid = createVerify("RSA-SHA256")
        .update(rawPayload)
        .verify(this._publicKeyPem, signatureHeader, "base64");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new UnauthenticatedWebhookError(this.id, `signature check failed: ${reason}`);
    }

    if (!valid) {
      throw new UnauthenticatedWebhookError(this.id, "signature mismatch");
    }
  }

  normalizeWebhookPayload(rawPayload: string): NormalizedPaymentEvent | null {
    const c = parseWebhookBody(this.id, rawPayload, CallbackSchema);
    const base = {
      provider: this.id,
      reference: c.externalId,
      occurredAt: new Date(c.completedAt).toISOString(),
      amount: parseMajor(c.amount, toCurrency(this.id, c.currency)),
      metadata: { ...c.metadata },
    };

    switch (c.status) {
      case "SUCCESSFUL":
        return { ...base, providerTransactionId: c.financialTransactionId, kind: "charge", status: "settled" };
      case "FAILED":
        return {
          ...base,
          providerTransactionId: c.financialTransactionId,
          kind: "charge",
          status: "failed",
          failureReason: c.reason ?? "declined",
        };
      case "REVERSED":
        // A reversal undoes a settled collection; it is recorded as money returned
        return {
          ...base,
          providerTransactionId: `${c.financialTransactionId}:reversal`,
          kind: "refund",
          status: "reversed",
          metadata: { ...base.metadata, reversedChargeId: c.financialTransactionId },
        };
      default:
        return null;
    }
  }
}

function toOutcome(result: z.output<typeof RequestToPaySchema>): ChargeOutcome {
  const id = result.financialTransactionId;
  const withId = id !== undefined ? { providerTransactionId: id } : {};
  switch (result.status) {
    case "SUCCESSFUL":
      return { status: "settled", ...withId };
    case "PENDING":
      return { status: "pending", ...withId };
    case "FAILED":
      return declined(result.reason, id);
  }
}
