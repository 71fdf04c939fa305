/**
 * Structured logging middleware.
 *
 * Uses pino for JSON-structured request logging.
 * Creates a child logger with requestId context per request.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
}

/**
 * Logs each request on completion with method, path, status and duration.
 * Server errors log at error level, client errors at warn.
 */
export function loggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    const log = logger.child({ requestId: c.get("requestId") });
    c.set("logger", log);

    await next();

    const entry: RequestLogEntry = {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Math.round(performance.now() - start),
    };
    const message = `${entry.method} ${entry.path} ${entry.status}`;

    if (entry.status >= 500) {
      log.error(entry, message);
    } else if (entry.status >= 400) {
      log.warn(entry, message);
    } else {
      log.info(entry, message);
    }
  };
}
