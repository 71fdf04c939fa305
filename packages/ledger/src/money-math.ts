/**
 * @quire/ledger — Deterministic monetary arithmetic.
 *
 * Money is held as integer minor units in a string and computed in bigint.
 * Provider payloads that speak major units ("12.50", "5000") are converted
 * once at the boundary with parseMajor.
 *
 * Rules:
 * - No floating-point operations
 * - Currency must match for all binary operations
 * - Rates are decimal strings, applied as exact rationals and rounded once
 */

import type { Currency, Money, RoundingMode } from "@quire/types";
import { CURRENCY_EXPONENTS, ValidationError, isCurrency } from "@quire/types";

// ─── Internal Helpers ────────────────────────────────────────────────────

const MINOR_PATTERN = /^-?\d+$/;
const MAJOR_PATTERN = /^-?\d+(\.\d+)?$/;
const RATE_PATTERN = /^\d+(\.\d+)?$/;

/**
 * Parse an integer minor-unit string into a bigint.
 *
 * "1050" → 1050n, "-200" → -200n
 */
export function parseMinor(amountMinor: string): bigint {
  if (typeof amountMinor !== "string" || !MINOR_PATTERN.test(amountMinor.trim())) {
    throw new ValidationError(
      `Invalid minor-unit amount: "${String(amountMinor)}"`,
      "INVALID_AMOUNT",
    );
  }
  return BigInt(amountMinor.trim());
}

/**
 * Build a Money value from minor units.
 */
export function money(amountMinor: bigint | number | string, currency: Currency): Money {
  if (typeof amountMinor === "number" && !Number.isSafeInteger(amountMinor)) {
    throw new ValidationError(`Minor-unit amount must be an integer, got ${amountMinor}`, "INVALID_AMOUNT");
  }
  const value = typeof amountMinor === "string" ? parseMinor(amountMinor) : BigInt(amountMinor);
  return { amountMinor: value.toString(), currency };
}

/**
 * Number of minor-unit digits for a currency.
 */
export function exponentOf(currency: Currency): number {
  return CURRENCY_EXPONENTS[currency];
}

// ─── Major-unit Conversion ───────────────────────────────────────────────

/**
 * Convert a major-unit decimal string into Money.
 *
 * "12.50" EUR → 1250 minor, "5000" XOF → 5000 minor.
 * More fractional digits than the currency allows is an error, never a rounding.
 */
export function parseMajor(amount: string, currency: string): Money {
  if (!isCurrency(currency)) {
    throw new ValidationError(`Unsupported currency: "${currency}"`, "CURRENCY_MISMATCH");
  }

  const trimmed = typeof amount === "string" ? amount.trim() : "";
  if (!MAJOR_PATTERN.test(trimmed)) {
    throw new ValidationError(`Invalid amount format: "${String(amount)}"`, "INVALID_AMOUNT");
  }

  const decimals = exponentOf(currency);
  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const [intPart = "0", fracPart = ""] = abs.split(".");

  // "5000.00" is acceptable for XOF; only non-zero excess digits are lossy
  const excess = fracPart.slice(decimals);
  if (/[1-9]/.test(excess)) {
    throw new ValidationError(
      `Amount "${trimmed}" has ${fracPart.length} decimal places, but ${currency} allows ${decimals}`,
      "INVALID_AMOUNT",
    );
  }

  const scaled = BigInt(intPart + fracPart.slice(0, decimals).padEnd(decimals, "0"));
  return { amountMinor: (negative ? -scaled : scaled).toString(), currency };
}

/**
 * Render Money in major units.
 *
 * 1050 EUR → "10.50", -5 USD → "-0.05", 5000 XOF → "5000"
 */
export function formatMajor(value: Money): string {
  const decimals = exponentOf(value.currency);
  const scaled = parseMinor(value.amountMinor);
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const str = (negative ? -scaled : scaled).toString().padStart(decimals + 1, "0");
  const result = `${str.slice(0, str.length - decimals)}.${str.slice(str.length - decimals)}`;
  return negative ? `-${result}` : result;
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Validate that a Money object is well-formed.
 * Throws ValidationError if invalid.
 */
export function validateMoney(value: Money): void {
  if (!isCurrency(value.currency)) {
    throw new ValidationError(`Unsupported currency: "${String(value.currency)}"`, "CURRENCY_MISMATCH");
  }
  parseMinor(value.amountMinor);
}

/**
 * Assert two Money values share a currency.
 */
export function assertSameCurrency(a: Money, b: Money): void {
  if (a.currency !== b.currency) {
    throw new ValidationError(
      `Cannot operate on different currencies: "${a.currency}" vs "${b.currency}"`,
      "CURRENCY_MISMATCH",
    );
  }
}

export function addMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return money(parseMinor(a.amountMinor) + parseMinor(b.amountMinor), a.currency);
}

export function subtractMoney(a: Money, b: Money): Money {
  assertSameCurrency(a, b);
  return money(parseMinor(a.amountMinor) - parseMinor(b.amountMinor), a.currency);
}

/**
 * Sum a list of Money values in one currency. An empty list is zero.
 */
export function sumMoney(values: readonly Money[], currency: Currency): Money {
  let total = 0n;
  for (const value of values) {
    if (value.currency !== currency) {
      throw new ValidationError(
        `Cannot sum "${value.currency}" into a "${currency}" total`,
        "CURRENCY_MISMATCH",
      );
    }
    total += parseMinor(value.amountMinor);
  }
  return money(total, currency);
}

/**
 * Multiply by an integer quantity (invoice lines).
 */
export function multiplyMoney(value: Money, quantity: number): Money {
  if (!Number.isSafeInteger(quantity)) {
    throw new ValidationError(`Quantity must be an integer, got ${quantity}`);
  }
  return money(parseMinor(value.amountMinor) * BigInt(quantity), value.currency);
}

export function negateMoney(value: Money): Money {
  return money(-parseMinor(value.amountMinor), value.currency);
}

export function isZero(value: Money): boolean {
  return parseMinor(value.amountMinor) === 0n;
}

export function isPositive(value: Money): boolean {
  return parseMinor(value.amountMinor) > 0n;
}

export function isNegative(value: Money): boolean {
  return parseMinor(value.amountMinor) < 0n;
}

export function zeroMoney(currency: Currency): Money {
  return { amountMinor: "0", currency };
}

/**
 * Compare two Money values. Returns -1, 0, or 1.
 */
export function compareMoney(a: Money, b: Money): -1 | 0 | 1 {
  assertSameCurrency(a, b);
  const va = parseMinor(a.amountMinor);
  const vb = parseMinor(b.amountMinor);
  if (va < vb) return -1;
  if (va > vb) return 1;
  return 0;
}

export function absMoney(value: Money): Money {
  const scaled = parseMinor(value.amountMinor);
  return money(scaled < 0n ? -scaled : scaled, value.currency);
}

// ─── Rates & Rounding ────────────────────────────────────────────────────

/**
 * A decimal rate as an exact fraction: "0.075" → 75 / 1000.
 */
export interface Rate {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

/**
 * Parse a non-negative decimal rate string.
 */
export function parseRate(rate: string): Rate {
  const trimmed = typeof rate === "string" ? rate.trim() : "";
  if (!RATE_PATTERN.test(trimmed)) {
    throw new ValidationError(`Invalid rate: "${String(rate)}"`, "INVALID_AMOUNT");
  }
  const [intPart = "0", fracPart = ""] = trimmed.split(".");
  return {
    numerator: BigInt(intPart + fracPart),
    denominator: 10n ** BigInt(fracPart.length),
  };
}

/**
 * Integer division with a rounding rule for the remainder.
 *
 * half_even rounds ties to the even neighbour (banker's rounding);
 * half_up rounds ties away from zero. Negative quotients round
 * symmetrically to positive ones.
 */
export function divideRounded(numerator: bigint, denominator: bigint, mode: RoundingMode): bigint {
  if (denominator <= 0n) {
    throw new ValidationError("Denominator must be positive", "INVALID_AMOUNT");
  }

  const negative = numerator < 0n;
  const abs = negative ? -numerator : numerator;
  let quotient = abs / denominator;
  const twiceRemainder = (abs % denominator) * 2n;

  if (twiceRemainder > denominator) {
    quotient += 1n;
  } else if (twiceRemainder === denominator) {
    if (mode === "half_up" || quotient % 2n === 1n) {
      quotient += 1n;
    }
  }

  return negative ? -quotient : quotient;
}

/**
 * Multiply Money by a decimal rate and round to the currency's minor unit.
 *
 * applyRate(1300 EUR, "0.70", "half_even") → 910 EUR
 * applyRate(125 EUR, "0.5", "half_even")   → 62 EUR (tie to even)
 */
export function applyRate(value: Money, rate: string | Rate, mode: RoundingMode): Money {
  const { numerator, denominator } = typeof rate === "string" ? parseRate(rate) : rate;
  const product = parseMinor(value.amountMinor) * numerator;
  return money(divideRounded(product, denominator, mode), value.currency);
}
