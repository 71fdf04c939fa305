/**
 * @quire/gateway — Webhook ingestion.
 *
 * A pure function of (provider, raw body, signature header): no HTTP
 * objects, so the same path serves the HTTP route, replays and tests.
 *
 * Pipeline:
 *   verify signature → normalize → ledger.ingest → reply
 *                                        └─▶ effects (inserted only, in the background)
 *
 * Rules:
 * - Authentication happens before any ledger access
 * - The ledger's unique external reference is the only dedup mechanism
 * - The reply depends only on the ledger write. Effects start once per
 *   inserted row and never delay or fail the reply; a failed effect is
 *   logged and left to payment reconciliation
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type { Clock, PaymentTransaction } from "@quire/types";
import { UnauthenticatedWebhookError, systemClock } from "@quire/types";
import type { LedgerStore } from "@quire/ledger";
import type { ProviderRegistry } from "./registry.js";
import { parseChargeReference } from "./reference.js";
import type {
  NormalizedPaymentEvent,
  PaymentEffectHandler,
  WebhookIngestResult,
} from "./types.js";

export interface WebhookIngestorOptions {
  readonly providers: ProviderRegistry;
  readonly ledger: LedgerStore;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly idFactory?: () => string;
}

export class WebhookIngestor {
  private readonly _providers: ProviderRegistry;
  private readonly _ledger: LedgerStore;
  private readonly _clock: Clock;
  private readonly _logger: Logger;
  private readonly _idFactory: () => string;
  private readonly _handlers = new Set<PaymentEffectHandler>();
  private readonly _inFlight = new Set<Promise<void>>();

  constructor(options: WebhookIngestorOptions) {
    this._providers = options.providers;
    this._ledger = options.ledger;
    this._clock = options.clock ?? systemClock;
    this._logger = (options.logger ?? pino({ level: "silent" })).child({ component: "webhook-ingestor" });
    this._idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Register a reaction to newly recorded transactions.
   *
   * @returns function that removes the handler
   */
  onPayment(handler: PaymentEffectHandler): () => void {
    this._handlers.add(handler);
    return () => {
      this._handlers.delete(handler);
    };
  }

  /**
   * @throws ValidationError for an unknown provider or malformed payload
   * @throws UnauthenticatedWebhookError when the signature check fails
   */
  async ingest(
    providerId: string,
    rawPayload: string,
    signatureHeader: string | undefined,
  ): Promise<WebhookIngestResult> {
    const provider = this._providers.get(providerId);

    try {
      provider.verifyWebhookSignature(rawPayload, signatureHeader);
    } catch (err) {
      if (err instanceof UnauthenticatedWebhookError) {
        this._logger.warn({ provider: providerId, reason: err.message }, "Rejected webhook");
      }
      throw err;
    }

    const event = provider.normalizeWebhookPayload(rawPayload);
    if (event === null) {
      this._logger.debug({ provider: providerId }, "Ignored webhook event type");
      return { status: "ignored" };
    }

    const result = this._ledger.ingest(this._toTransaction(event));
    if (result.outcome === "duplicate") {
      this._logger.debug(
        { provider: providerId, providerTransactionId: event.providerTransactionId },
        "Duplicate webhook delivery",
      );
      return { status: "duplicate", transaction: result.transaction };
    }

    this._logger.info(
      {
        provider: providerId,
        transactionId: result.transaction.id,
        kind: result.transaction.kind,
        status: result.transaction.status,
      },
      "Recorded payment transaction",
    );

    this._runEffects(result.transaction);
    return { status: "accepted", transaction: result.transaction };
  }

  /** Resolves once every effect started so far has finished. */
  async drain(): Promise<void> {
    while (this._inFlight.size > 0) {
      await Promise.all(this._inFlight);
    }
  }

  /**
   * Run every effect handler for a transaction. All handlers run; the
   * first failure is rethrown afterwards.
   */
  async dispatch(transaction: PaymentTransaction): Promise<void> {
    let firstError: unknown;
    let failed = false;
    for (const handler of this._handlers) {
      try {
        await handler(transaction);
      } catch (err) {
        this._logger.error({ err, transactionId: transaction.id }, "Payment effect handler failed");
        if (!failed) {
          failed = true;
          firstError = err;
        }
      }
    }
    if (failed) {
      throw firstError;
    }
  }

  private _runEffects(transaction: PaymentTransaction): void {
    const running: Promise<void> = this.dispatch(transaction)
      .catch((err: unknown) => {
        this._logger.warn(
          { err, transactionId: transaction.id },
          "Payment effects incomplete, left to reconciliation",
        );
      })
      .finally(() => {
        this._inFlight.delete(running);
      });
    this._inFlight.add(running);
  }

  private _toTransaction(event: NormalizedPaymentEvent): PaymentTransaction {
    const { invoiceId } = parseChargeReference(event.reference);
    const finished = event.status === "settled" || event.status === "reversed";
    return {
      id: this._idFactory(),
      externalRef: { provider: event.provider, providerTransactionId: event.providerTransactionId },
      amount: event.amount,
      kind: event.kind,
      status: event.status,
      subjectRef: { type: "invoice", id: invoiceId },
      createdAt: event.occurredAt,
      ...(finished ? { settledAt: event.occurredAt } : {}),
      ...(event.failureReason !== undefined ? { failureReason: event.failureReason } : {}),
      metadata: {
        ...event.metadata,
        chargeReference: event.reference,
        receivedAt: this._clock.now().toISOString(),
      },
    };
  }
}
