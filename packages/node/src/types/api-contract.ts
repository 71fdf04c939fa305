/**
 * Hono application environment type.
 *
 * Middleware populates Variables; route handlers read them via c.get().
 */

import type { Logger } from "pino";
import type { BillingEngine } from "../services/billing-engine.js";

export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Request-scoped child logger (set by logger middleware) */
    logger: Logger;

    /** The engine every route delegates to */
    engine: BillingEngine;
  };
}
