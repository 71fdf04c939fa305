/**
 * Money Types
 *
 * Exact monetary amounts in integer minor units.
 *
 * Rules:
 * - Amounts are base-10 integer strings of minor units (cents, francs)
 * - Currency is always explicit, and only the supported set is representable
 * - Arithmetic happens in bigint (see @quire/ledger money-math)
 */

/**
 * Currencies the engine settles in.
 * XOF and XAF (CFA francs) have no minor unit.
 */
export type Currency = "EUR" | "USD" | "XOF" | "XAF";

export const SUPPORTED_CURRENCIES: readonly Currency[] = ["EUR", "USD", "XOF", "XAF"];

/** Number of minor-unit digits per currency (ISO 4217 exponent). */
export const CURRENCY_EXPONENTS: Readonly<Record<Currency, number>> = {
  EUR: 2,
  USD: 2,
  XOF: 0,
  XAF: 0,
};

/**
 * A precise monetary amount.
 */
export interface Money {
  /** Integer amount of minor units, e.g. "1050" for 10.50 EUR or "5000" for 5000 XOF */
  readonly amountMinor: string;

  readonly currency: Currency;
}

/** Rounding rule used when a rate produces fractional minor units. */
export type RoundingMode = "half_even" | "half_up";
