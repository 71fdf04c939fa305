/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createWebhookRoutes, SIGNATURE_HEADERS } from "./webhooks.js";
export { createInvoiceRoutes } from "./invoices.js";
export { createSubscriptionRoutes } from "./subscriptions.js";
export { createRoyaltyRoutes } from "./royalties.js";
export { createConfigRoutes } from "./config.js";
