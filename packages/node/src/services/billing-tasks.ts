/**
 * Background task types and their handlers.
 *
 * Every handler is idempotent: running it twice, or after a partial
 * failure, converges on the same state.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Period } from "@quire/types";
import { ImmutablePeriodError } from "@quire/types";
import type { BillingEngine } from "./billing-engine.js";
import type { TaskQueue } from "./task-queue.js";

export interface BillingTasks {
  "subscription.tick": { readonly subscriptionId: string };
  "invoice.overdue-sweep": { readonly requestedAt: string };
  "royalty.batch": { readonly period: Period; readonly authorRef?: string };
  "payment.reconcile": { readonly requestedAt: string };
}

export type BillingTaskQueue = TaskQueue<BillingTasks>;

export function registerBillingTasks(
  queue: BillingTaskQueue,
  engine: BillingEngine,
  logger: Logger = pino({ level: "silent" }),
): void {
  const log = logger.child({ component: "billing-tasks" });

  queue.register("subscription.tick", async ({ subscriptionId }) => {
    const subscription = await engine.tickSubscription(subscriptionId);
    log.debug({ subscriptionId, status: subscription.status }, "Subscription ticked");
  });

  queue.register("invoice.overdue-sweep", async () => {
    const changed = await engine.sweepOverdue();
    log.debug({ count: changed.length }, "Overdue sweep finished");
  });

  queue.register("royalty.batch", async ({ period, authorRef }) => {
    try {
      const records = await engine.computeRoyalties(
        period,
        authorRef !== undefined ? { authorRef } : {},
      );
      log.info({ period, authorRef, records: records.length }, "Royalty batch finished");
    } catch (err) {
      // A paid period stays as it is; corrections go through their own path.
      if (err instanceof ImmutablePeriodError) {
        log.info({ period, authorRef }, "Royalty period already paid, batch skipped");
        return;
      }
      throw err;
    }
  });

  queue.register("payment.reconcile", async () => {
    await engine.reconcilePayments();
  });
}

/** The calendar month (UTC) before the one containing `now`. */
export function previousMonth(now: Date): Period {
  const end = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
  const start = new Date(Date.UTC(end.getUTCFullYear(), end.getUTCMonth() - 1, 1));
  return { start: start.toISOString(), end: end.toISOString() };
}
