/**
 * Charge references.
 *
 * A reference names the invoice being paid and the attempt number, so a
 * retry is a new provider charge while a redelivered webhook for the same
 * attempt maps to the same ledger row.
 */

import { ValidationError } from "@quire/types";

const REFERENCE_PATTERN = /^([^:\s]+):(\d+)$/;

export function chargeReference(invoiceId: string, attempt: number): string {
  if (invoiceId.includes(":") || invoiceId.length === 0) {
    throw new ValidationError(`Invoice id "${invoiceId}" cannot be used in a charge reference`);
  }
  if (!Number.isInteger(attempt) || attempt < 1) {
    throw new ValidationError(`Charge attempt must be a positive integer, got ${attempt}`);
  }
  return `${invoiceId}:${attempt}`;
}

export function parseChargeReference(reference: string): { invoiceId: string; attempt: number } {
  const match = REFERENCE_PATTERN.exec(reference);
  if (match === null || match[1] === undefined || match[2] === undefined) {
    throw new ValidationError(`Malformed charge reference "${reference}"`);
  }
  return { invoiceId: match[1], attempt: Number(match[2]) };
}
