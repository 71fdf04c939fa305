/**
 * @quire/ledger — Money math and the exactly-once payment ledger.
 *
 * Provides:
 * - Deterministic bigint money arithmetic in minor units
 * - Rate application with banker's or half-up rounding
 * - LedgerStore contract with in-memory and JSONL implementations
 *
 * @packageDocumentation
 */

export type { IngestResult, TransactionFilter, LedgerStore } from "./types.js";
export type { Rate } from "./money-math.js";

export {
  parseMinor,
  money,
  exponentOf,
  parseMajor,
  formatMajor,
  validateMoney,
  assertSameCurrency,
  addMoney,
  subtractMoney,
  sumMoney,
  multiplyMoney,
  negateMoney,
  isZero,
  isPositive,
  isNegative,
  zeroMoney,
  compareMoney,
  absMoney,
  parseRate,
  divideRounded,
  applyRate,
} from "./money-math.js";

export {
  externalKey,
  effectiveAt,
  validateTransaction,
  matchesFilter,
  isMoneyReturned,
  netSettled,
} from "./transactions.js";

export { InMemoryLedgerStore } from "./in-memory-ledger.js";
export { JsonlLedgerStore } from "./jsonl-ledger.js";
export type { JsonlLedgerStoreOptions } from "./jsonl-ledger.js";
