/**
 * Filter, sort and count rate quotes. Pure; the rate operation feeds it the
 * provider's quotes verbatim.
 */

import type { DurationOperator, RateQuote, RateShopFilters, RateShopResult } from "../domain/types.js";

export const DEFAULT_DURATION_OPERATOR: DurationOperator = "less_than_or_equal";

/** Numeric charge of a quote: NaN when not a number or numeric string, 0 when absent */
export function chargeOf(quote: RateQuote): number {
  const charge = quote.totalCarrierCharge;
  if (charge === undefined) return 0;
  if (typeof charge === "number") return charge;
  return charge.trim() === "" ? Number.NaN : Number(charge);
}

/** Whole days from a commitment field; absent counts as 0, garbage as NaN */
function daysOf(value: number | string | undefined): number {
  if (value === undefined) return 0;
  if (typeof value === "number") return Math.trunc(value);
  return parseInt(value, 10);
}

function compare(days: number, bound: number, operator: DurationOperator): boolean {
  return operator === "less_than" ? days < bound : days <= bound;
}

/**
 * A quote meets a duration bound when its best case OR its worst case does:
 * a quote whose minimum transit time fits passes even if its maximum does not.
 */
export function meetsDuration(quote: RateQuote, bound: number, operator: DurationOperator): boolean {
  const commitment = quote.deliveryCommitment;
  const minDays = daysOf(commitment?.minEstimatedNumberOfDays);
  const maxDays = daysOf(commitment?.maxEstimatedNumberOfDays);
  return compare(minDays, bound, operator) || compare(maxDays, bound, operator);
}

export function applyRateFilters(quotes: readonly RateQuote[], filters: RateShopFilters = {}): RateShopResult {
  const maxPrice = filters.maxPrice ?? 0;
  const durationValue = filters.durationValue ?? 0;
  const operator = filters.durationOperator ?? DEFAULT_DURATION_OPERATOR;

  // Zero and negative charges are placeholders, not offers.
  const priced = quotes.filter((q) => !(chargeOf(q) <= 0));
  const filteredCount = priced.length;

  let survivors = priced;
  if (maxPrice > 0) {
    survivors = survivors.filter((q) => chargeOf(q) <= maxPrice);
  }
  if (durationValue > 0) {
    survivors = survivors.filter((q) => meetsDuration(q, durationValue, operator));
  }

  const sortKey = (q: RateQuote): number => {
    const charge = chargeOf(q);
    return Number.isNaN(charge) ? 0 : charge;
  };
  const shippingOptions = [...survivors].sort((a, b) => sortKey(a) - sortKey(b));

  return {
    totalOptions: shippingOptions.length,
    filteredCount,
    shippingOptions,
  };
}

/** Trim a result for display; totalOptions keeps the full count */
export function limitOptions(result: RateShopResult, maxResults?: number): RateShopResult {
  if (!maxResults || maxResults <= 0 || result.shippingOptions.length <= maxResults) return result;
  return { ...result, shippingOptions: result.shippingOptions.slice(0, maxResults) };
}
