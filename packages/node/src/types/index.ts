/**
 * Type barrel — re-exports all public types from @quire/node.
 */

// DTOs
export {
  CreateInvoiceSchema,
  ListInvoicesQuerySchema,
  VoidInvoiceSchema,
  CreateSubscriptionSchema,
  CancelSubscriptionSchema,
  RoyaltySummaryQuerySchema,
  ComputeRoyaltiesSchema,
  RoyaltyCorrectionSchema,
  MarkRoyaltiesPaidSchema,
  SetConfigSchema,
} from "./dto.js";
export type {
  CreateInvoiceDto,
  ListInvoicesQuery,
  VoidInvoiceDto,
  CreateSubscriptionDto,
  CancelSubscriptionDto,
  RoyaltySummaryQuery,
  ComputeRoyaltiesDto,
  RoyaltyCorrectionDto,
  MarkRoyaltiesPaidDto,
  SetConfigDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// App env
export type { AppEnv } from "./api-contract.js";
