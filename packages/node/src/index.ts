/**
 * @quire/node — Billing engine service.
 *
 * Composition root, background task queue and scheduler, and the HTTP
 * surface over them. Importing this module starts nothing; `main.ts` is
 * the process entry point.
 *
 * @packageDocumentation
 */

export { BillingEngine, DEFAULTS_EFFECTIVE_FROM } from "./services/billing-engine.js";
export type { BillingEngineOptions, EngineHealth, IdKind } from "./services/billing-engine.js";
export { TaskQueue } from "./services/task-queue.js";
export type {
  TaskHandler,
  EnqueueOutcome,
  DeadLetter,
  TaskQueueOptions,
  TaskQueueStats,
} from "./services/task-queue.js";
export { registerBillingTasks, previousMonth } from "./services/billing-tasks.js";
export type { BillingTasks, BillingTaskQueue } from "./services/billing-tasks.js";
export { Scheduler } from "./services/scheduler.js";
export type { SchedulerOptions, ScheduleRun } from "./services/scheduler.js";
export { buildProviders } from "./services/providers.js";
export type { ProviderDeps } from "./services/providers.js";

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./types/index.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
