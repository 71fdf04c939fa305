/**
 * In-process task queue with per-key de-duplication.
 *
 * Tasks are identified by (type, key). For each identity:
 * - If nothing runs: start immediately
 * - If one runs and none waits: keep one pending, with the latest payload
 * - If one runs and one waits: collapse into the waiting one
 *
 * So at most two instances exist per key: one running and one pending.
 * The pending one picks up changes made while the first was running.
 *
 * Delivery is at-least-once: a handler that throws is redelivered with
 * exponential backoff up to `maxDeliveries`, after which the task is
 * recorded as a dead letter. Handlers must be idempotent.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { Clock } from "@quire/types";
import { ValidationError, systemClock } from "@quire/types";
import type { RetryConfig } from "@quire/gateway";
import { computeDelay } from "@quire/gateway";

// =============================================================================
// Types
// =============================================================================

export type TaskHandler<P> = (payload: P) => Promise<void>;

/** What happened to an enqueue call. */
export type EnqueueOutcome = "started" | "pending" | "deduplicated" | "dropped";

export interface DeadLetter {
  readonly type: string;
  readonly key: string;
  readonly deliveries: number;
  readonly error: string;
  readonly failedAt: string;
}

export interface TaskQueueStats {
  readonly running: number;
  readonly pending: number;
  readonly processed: number;
  readonly redelivered: number;
  readonly deadLetters: number;
}

export interface TaskQueueOptions {
  /** Deliveries per task including the first. Default: 5 */
  readonly maxDeliveries?: number;
  /** Backoff between redeliveries. Default: 1s base, 60s cap */
  readonly backoff?: RetryConfig;
  /** Injectable for tests */
  readonly sleepFn?: (ms: number) => Promise<void>;
  readonly clock?: Clock;
  readonly logger?: Logger;
}

interface KeyState {
  pending: (() => Promise<void>) | undefined;
  done: Promise<void>;
}

const DEFAULT_BACKOFF: RetryConfig = {
  maxAttempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 60000,
  jitterMs: 250,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Queue
// =============================================================================

/**
 * @typeParam M - map from task type to its payload
 */
export class TaskQueue<M extends object> {
  private readonly _handlers: { [K in keyof M]?: TaskHandler<M[K]> } = {};
  private readonly _states = new Map<string, KeyState>();
  private readonly _deadLetters: DeadLetter[] = [];
  private readonly _maxDeliveries: number;
  private readonly _backoff: RetryConfig;
  private readonly _sleep: (ms: number) => Promise<void>;
  private readonly _clock: Clock;
  private readonly _logger: Logger;

  private _processed = 0;
  private _redelivered = 0;
  private _stopped = false;

  constructor(options: TaskQueueOptions = {}) {
    this._maxDeliveries = options.maxDeliveries ?? 5;
    this._backoff = options.backoff ?? DEFAULT_BACKOFF;
    this._sleep = options.sleepFn ?? sleep;
    this._clock = options.clock ?? systemClock;
    this._logger = (options.logger ?? pino({ level: "silent" })).child({ component: "task-queue" });
  }

  register<K extends keyof M & string>(type: K, handler: TaskHandler<M[K]>): void {
    if (this._handlers[type] !== undefined) {
      throw new ValidationError(`A handler for task "${type}" is already registered`);
    }
    this._handlers[type] = handler;
  }

  /**
   * @throws ValidationError when no handler is registered for `type`
   */
  enqueue<K extends keyof M & string>(type: K, key: string, payload: M[K]): EnqueueOutcome {
    const handler = this._handlers[type];
    if (handler === undefined) {
      throw new ValidationError(`No handler registered for task "${type}"`);
    }
    if (this._stopped) {
      this._logger.debug({ type, key }, "Queue stopped, task dropped");
      return "dropped";
    }

    const slot = `${type}|${key}`;
    const delivery = () => this._deliver(type, key, handler, payload);
    const state = this._states.get(slot);

    if (state === undefined) {
      const fresh: KeyState = { pending: undefined, done: Promise.resolve() };
      this._states.set(slot, fresh);
      fresh.done = this._run(slot, delivery);
      this._logger.debug({ type, key }, "Task started");
      return "started";
    }

    const outcome: EnqueueOutcome = state.pending === undefined ? "pending" : "deduplicated";
    state.pending = delivery;
    this._logger.debug({ type, key, outcome }, "Task queued behind running instance");
    return outcome;
  }

  /** Resolves once nothing is running or pending, including follow-ups. */
  async drain(): Promise<void> {
    while (this._states.size > 0) {
      await Promise.all([...this._states.values()].map((s) => s.done));
    }
  }

  /** Refuse new tasks and wait for the current ones. */
  async stop(): Promise<void> {
    this._stopped = true;
    await this.drain();
  }

  isRunning(type: keyof M & string, key: string): boolean {
    return this._states.has(`${type}|${key}`);
  }

  get deadLetters(): readonly DeadLetter[] {
    return this._deadLetters;
  }

  stats(): TaskQueueStats {
    let pending = 0;
    for (const state of this._states.values()) {
      if (state.pending !== undefined) {
        pending++;
      }
    }
    return {
      running: this._states.size,
      pending,
      processed: this._processed,
      redelivered: this._redelivered,
      deadLetters: this._deadLetters.length,
    };
  }

  // ─── Internal ──────────────────────────────────────────────────────

  private async _run(slot: string, first: () => Promise<void>): Promise<void> {
    let next: (() => Promise<void>) | undefined = first;
    while (next !== undefined) {
      await next();
      const state = this._states.get(slot);
      next = state?.pending;
      if (state !== undefined) {
        state.pending = undefined;
      }
    }
    this._states.delete(slot);
  }

  private async _deliver<P>(type: string, key: string, handler: TaskHandler<P>, payload: P): Promise<void> {
    for (let delivery = 1; ; delivery++) {
      try {
        await handler(payload);
        this._processed++;
        return;
      } catch (err) {
        if (delivery >= this._maxDeliveries) {
          const message = err instanceof Error ? err.message : String(err);
          this._deadLetters.push({
            type,
            key,
            deliveries: delivery,
            error: message,
            failedAt: this._clock.now().toISOString(),
          });
          this._logger.error({ err, type, key, deliveries: delivery }, "Task failed, moved to dead letters");
          return;
        }
        const delayMs = computeDelay(delivery - 1, this._backoff);
        this._redelivered++;
        this._logger.warn({ err, type, key, delivery, delayMs }, "Task failed, redelivering");
        await this._sleep(delayMs);
      }
    }
  }
}
