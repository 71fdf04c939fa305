/**
 * @quire/gateway — Charge execution.
 *
 * Starts a charge through a provider, absorbing transient failures with
 * backoff, and records the final answer in the ledger.
 *
 * Outcomes:
 * - settled  → settled charge row (or the row a faster webhook already wrote)
 * - failed   → failed charge row carrying the decline reason
 * - pending  → nothing recorded; the webhook or a later status check settles it
 *
 * Transient exhaustion is final for this attempt and recorded as a failed
 * row keyed by the charge reference, so the dunning schedule sees it.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import type { Clock, PaymentTransaction } from "@quire/types";
import { ProviderError, systemClock } from "@quire/types";
import type { LedgerStore } from "@quire/ledger";
import type { ProviderRegistry } from "./registry.js";
import type { RetryConfig } from "./retry.js";
import { DEFAULT_RETRY_CONFIG, RetryExhaustedError, sleep, withRetry } from "./retry.js";
import type { ChargeOutcome, ChargeRequest } from "./types.js";

export type ChargeResult =
  | { readonly status: "settled" | "failed"; readonly transaction: PaymentTransaction }
  | { readonly status: "pending"; readonly providerTransactionId?: string };

export interface ChargeExecutorOptions {
  readonly providers: ProviderRegistry;
  readonly ledger: LedgerStore;
  readonly retry?: RetryConfig;
  /** Injectable for tests */
  readonly sleepFn?: (ms: number) => Promise<void>;
  readonly clock?: Clock;
  readonly logger?: Logger;
  readonly idFactory?: () => string;
}

export class ChargeExecutor {
  private readonly _providers: ProviderRegistry;
  private readonly _ledger: LedgerStore;
  private readonly _retry: RetryConfig;
  private readonly _sleep: (ms: number) => Promise<void>;
  private readonly _clock: Clock;
  private readonly _logger: Logger;
  private readonly _idFactory: () => string;

  constructor(options: ChargeExecutorOptions) {
    this._providers = options.providers;
    this._ledger = options.ledger;
    this._retry = options.retry ?? DEFAULT_RETRY_CONFIG;
    this._sleep = options.sleepFn ?? sleep;
    this._clock = options.clock ?? systemClock;
    this._logger = (options.logger ?? pino({ level: "silent" })).child({ component: "charge-executor" });
    this._idFactory = options.idFactory ?? randomUUID;
  }

  async execute(request: ChargeRequest): Promise<ChargeResult> {
    const provider = this._providers.get(request.paymentMethod.provider);

    let outcome: ChargeOutcome;
    try {
      outcome = await withRetry(
        () => provider.initiateCharge(request),
        this._retry,
        undefined,
        this._sleep,
      );
    } catch (err) {
      const reason = failureReasonOf(err);
      if (reason === undefined) {
        throw err;
      }
      this._logger.warn({ reference: request.reference, provider: provider.id, reason }, "Charge failed");
      return this._record(request, { status: "failed", failureReason: reason });
    }

    return this._settle(request, outcome);
  }

  /**
   * Ask the provider about an earlier pending charge and record the answer.
   *
   * @returns null when the provider has no charge under this reference
   */
  async checkStatus(request: ChargeRequest): Promise<ChargeResult | null> {
    const provider = this._providers.get(request.paymentMethod.provider);
    const outcome = await withRetry(
      () => provider.getChargeStatus(request.reference),
      this._retry,
      undefined,
      this._sleep,
    );
    return outcome === null ? null : this._settle(request, outcome);
  }

  private _settle(request: ChargeRequest, outcome: ChargeOutcome): ChargeResult {
    // Without a provider id a settled row could not be matched to its webhook
    const { status, providerTransactionId, failureReason } = outcome;
    if (status === "pending" || (status === "settled" && providerTransactionId === undefined)) {
      this._logger.info({ reference: request.reference }, "Charge pending");
      return {
        status: "pending",
        ...(providerTransactionId !== undefined ? { providerTransactionId } : {}),
      };
    }
    return this._record(request, {
      status,
      ...(providerTransactionId !== undefined ? { providerTransactionId } : {}),
      ...(failureReason !== undefined ? { failureReason } : {}),
    });
  }

  private _record(
    request: ChargeRequest,
    outcome: { status: "settled" | "failed"; providerTransactionId?: string; failureReason?: string },
  ): ChargeResult {
    const provider = request.paymentMethod.provider;
    const now = this._clock.now().toISOString();
    const settled = outcome.status === "settled";

    const { transaction } = this._ledger.ingest({
      id: this._idFactory(),
      externalRef: { provider, providerTransactionId: outcome.providerTransactionId ?? request.reference },
      amount: request.amount,
      kind: "charge",
      status: settled ? "settled" : "failed",
      subjectRef: request.subjectRef,
      createdAt: now,
      ...(settled ? { settledAt: now } : {}),
      ...(outcome.failureReason !== undefined ? { failureReason: outcome.failureReason } : {}),
      metadata: { ...request.metadata, chargeReference: request.reference },
    });

    // The stored row wins: a webhook may have recorded the final state first
    const status = transaction.status === "settled" ? "settled" : "failed";
    this._logger.info(
      { reference: request.reference, transactionId: transaction.id, status },
      "Recorded charge outcome",
    );
    return { status, transaction };
  }
}

/** Failure reason for errors that end an attempt, undefined for the rest. */
function failureReasonOf(err: unknown): string | undefined {
  if (err instanceof RetryExhaustedError) {
    const last = err.lastError instanceof ProviderError ? err.lastError.reason : "provider unavailable";
    return `retries_exhausted: ${last}`;
  }
  if (err instanceof ProviderError && err.kind === "permanent") {
    return `provider_rejected: ${err.reason}`;
  }
  return undefined;
}
