/**
 * Invoice line items: validation, totals and tax.
 */

import type { Currency, InvoiceItem, Money, RoundingMode } from "@quire/types";
import { InvoiceItemSchema, ValidationError } from "@quire/types";
import {
  applyRate,
  isNegative,
  isPositive,
  isZero,
  multiplyMoney,
  sumMoney,
  validateMoney,
} from "@quire/ledger";

/**
 * Check every item against the invoice currency and its sign rule.
 *
 * @throws ValidationError (CURRENCY_MISMATCH for a foreign-currency item)
 */
export function validateItems(items: readonly InvoiceItem[], currency: Currency): void {
  if (items.length === 0) {
    throw new ValidationError("An invoice needs at least one item");
  }

  items.forEach((item, index) => {
    const parsed = InvoiceItemSchema.safeParse(item);
    if (!parsed.success) {
      throw new ValidationError(`Item ${index} is malformed`, "VALIDATION_FAILED", {
        issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      });
    }
    validateMoney(item.unitPrice);

    if (item.unitPrice.currency !== currency) {
      throw new ValidationError(
        `Item ${index} is priced in ${item.unitPrice.currency}, invoice currency is ${currency}`,
        "CURRENCY_MISMATCH",
      );
    }

    if (item.itemType === "discount" ? isPositive(item.unitPrice) : isNegative(item.unitPrice)) {
      throw new ValidationError(
        item.itemType === "discount"
          ? `Discount item ${index} must not have a positive unit price`
          : `Item ${index} must not have a negative unit price`,
        "INVALID_AMOUNT",
      );
    }
  });
}

/** Σ quantity × unitPrice. */
export function computeTotal(items: readonly InvoiceItem[], currency: Currency): Money {
  return sumMoney(
    items.map((i) => multiplyMoney(i.unitPrice, i.quantity)),
    currency,
  );
}

/**
 * Tax line on everything that is not already tax, or null when the tax
 * rounds to zero.
 */
export function taxItem(
  items: readonly InvoiceItem[],
  currency: Currency,
  country: string,
  rate: string,
  roundingMode: RoundingMode,
): InvoiceItem | null {
  const taxable = computeTotal(
    items.filter((i) => i.itemType !== "tax"),
    currency,
  );
  const tax = applyRate(taxable, rate, roundingMode);
  if (isZero(tax) || isNegative(tax)) {
    return null;
  }
  return { description: `Tax ${country} ${rate}`, quantity: 1, unitPrice: tax, itemType: "tax" };
}
