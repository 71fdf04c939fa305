/**
 * Revenue attribution: which author a ledger row pays, and as what.
 */

import type { PaymentTransaction, RevenueType } from "@quire/types";
import { RevenueTypeSchema } from "@quire/types";

export interface Attribution {
  readonly authorRef: string;
  readonly revenueType: RevenueType;
}

/** Returns null for rows that pay no author. */
export type AttributionResolver = (transaction: PaymentTransaction) => Attribution | null;

/**
 * Reads `authorRef` and `revenueType` from transaction metadata.
 * Rows without an author are skipped; an unknown or missing revenue type
 * counts as a direct sale.
 */
export const metadataAttribution: AttributionResolver = (tx) => {
  const authorRef = tx.metadata["authorRef"];
  if (authorRef === undefined || authorRef.trim() === "") {
    return null;
  }
  const revenueType = RevenueTypeSchema.safeParse(tx.metadata["revenueType"]);
  return { authorRef, revenueType: revenueType.success ? revenueType.data : "direct_sale" };
};
