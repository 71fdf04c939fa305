/**
 * @quire/royalties — Royalty Calculator.
 *
 * Per-author royalties from settled ledger revenue, with per-date rates,
 * configurable rounding, payout thresholds with carry-forward, immutable
 * paid periods and correction records.
 *
 * @packageDocumentation
 */

export { RoyaltyCalculator } from "./calculator.js";
export type {
  RoyaltyCalculatorOptions,
  ComputeRoyaltiesOptions,
  RoyaltySummary,
  CurrencySummary,
} from "./calculator.js";

export { metadataAttribution } from "./attribution.js";
export type { Attribution, AttributionResolver } from "./attribution.js";

export {
  ROYALTY_COMPUTED,
  ROYALTY_CORRECTED,
  ROYALTY_PAID,
  ROYALTY_EVENT_SCHEMAS,
  authorStream,
} from "./events.js";
export type { RoyaltyComputedPayload, RoyaltyCorrectedPayload, RoyaltyPaidPayload } from "./events.js";
