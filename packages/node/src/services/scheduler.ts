/**
 * Periodic scheduler.
 *
 * Every interval it enqueues the work that is due: one tick per due
 * subscription, the overdue sweep, payment reconciliation and, once per
 * month, the royalty batch for the month that just closed. The queue
 * de-duplicates, so a slow handler never piles up ticks.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Clock } from "@quire/types";
import { systemClock } from "@quire/types";
import type { BillingEngine } from "./billing-engine.js";
import type { BillingTaskQueue } from "./billing-tasks.js";
import { previousMonth } from "./billing-tasks.js";

export interface SchedulerOptions {
  readonly engine: BillingEngine;
  readonly queue: BillingTaskQueue;
  readonly intervalMs: number;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

export interface ScheduleRun {
  readonly subscriptions: number;
  readonly royaltyPeriod?: string;
}

export class Scheduler {
  private readonly _engine: BillingEngine;
  private readonly _queue: BillingTaskQueue;
  private readonly _intervalMs: number;
  private readonly _clock: Clock;
  private readonly _logger: Logger;
  private _timer: ReturnType<typeof setInterval> | undefined;
  private _lastRoyaltyPeriod: string | undefined;

  constructor(options: SchedulerOptions) {
    this._engine = options.engine;
    this._queue = options.queue;
    this._intervalMs = options.intervalMs;
    this._clock = options.clock ?? systemClock;
    this._logger = (options.logger ?? pino({ level: "silent" })).child({ component: "scheduler" });
  }

  start(): void {
    if (this._timer !== undefined) {
      return;
    }
    this._timer = setInterval(() => {
      this.runOnce();
    }, this._intervalMs);
    this._timer.unref();
    this._logger.info({ intervalMs: this._intervalMs }, "Scheduler started");
  }

  stop(): void {
    if (this._timer !== undefined) {
      clearInterval(this._timer);
      this._timer = undefined;
      this._logger.info("Scheduler stopped");
    }
  }

  get running(): boolean {
    return this._timer !== undefined;
  }

  /** Enqueue everything due now. */
  runOnce(): ScheduleRun {
    const now = this._clock.now();
    const requestedAt = now.toISOString();

    const due = this._engine.subscriptions.dueSubscriptions(now);
    for (const subscription of due) {
      this._queue.enqueue("subscription.tick", subscription.id, { subscriptionId: subscription.id });
    }
    this._queue.enqueue("invoice.overdue-sweep", "all", { requestedAt });
    this._queue.enqueue("payment.reconcile", "all", { requestedAt });

    const period = previousMonth(now);
    let royaltyPeriod: string | undefined;
    if (period.start !== this._lastRoyaltyPeriod) {
      this._queue.enqueue("royalty.batch", period.start, { period });
      this._lastRoyaltyPeriod = period.start;
      royaltyPeriod = period.start;
    }

    if (due.length > 0) {
      this._logger.debug({ due: due.length }, "Enqueued subscription ticks");
    }
    return royaltyPeriod !== undefined
      ? { subscriptions: due.length, royaltyPeriod }
      : { subscriptions: due.length };
  }
}
