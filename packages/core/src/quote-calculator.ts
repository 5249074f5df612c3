/**
 * Quote Calculator - Pure logic for quote price calculation
 *
 * - Inventory skew for position management
 * - Symmetric buy/sell prices around the reference price
 * - Tick alignment (nearest multiple, ties half-up)
 *
 * Arithmetic runs in decimal.js so that tick multiples such as 0.1 round
 * the way they read rather than the way binary floats store them.
 *
 * This module is pure (no I/O, no throw).
 */

import Decimal from "decimal.js";

import { calculateReferencePrice } from "./feature-calculator";
import { calculateQuoteSize } from "./risk-policy";
import type { PositionLimit, QuoteDecision, QuoteInput } from "./types";

/**
 * Calculate inventory skew
 *
 * skew = (position / limit) * skew_factor
 *
 * Positive inventory → positive skew → both prices shift down (encourage selling)
 * Negative inventory → negative skew → both prices shift up (encourage buying)
 * Unbounded limit → 0
 *
 * @param position - Current signed position
 * @param limit - Instrument position limit
 * @param skewFactor - Skew at full limit
 */
export function calculateSkew(position: number, limit: PositionLimit, skewFactor: number): number {
  if (limit.kind === "unbounded") {
    return 0;
  }

  return new Decimal(position).div(limit.value).times(skewFactor).toNumber();
}

/**
 * Calculate raw (unaligned) buy and sell prices
 *
 * buy  = mid - spread / 2 - skew
 * sell = mid + spread / 2 - skew
 *
 * Note: Skew is subtracted from both to shift the entire quote
 */
export function calculateRawQuotePrices(
  referencePrice: number,
  spread: number,
  skew: number,
): { buyPrice: number; sellPrice: number } {
  const mid = new Decimal(referencePrice);
  const halfSpread = new Decimal(spread).div(2);

  return {
    buyPrice: mid.minus(halfSpread).minus(skew).toNumber(),
    sellPrice: mid.plus(halfSpread).minus(skew).toNumber(),
  };
}

/**
 * Round a price to the nearest multiple of the tick size
 *
 * Ties round half-up: with tick 0.5, 100.25 → 100.5 and 99.75 → 100.
 */
export function alignToTick(price: number, tickSize: number): number {
  return new Decimal(price).toNearest(tickSize, Decimal.ROUND_HALF_UP).toNumber();
}

/**
 * Generate the quote decision for one instrument
 *
 * @param input - Instrument, its book, current position and params
 * @returns QUOTE with tick-aligned prices and size, or NO_QUOTE when halted
 */
export function generateQuote(input: QuoteInput): QuoteDecision {
  const { instrument, book, position, params } = input;

  if (params.haltedTickers.includes(instrument.ticker)) {
    return { type: "NO_QUOTE", ticker: instrument.ticker, reason: "TICKER_HALTED" };
  }

  const referencePrice = calculateReferencePrice(book, params.defaultReferencePrice);
  const skew = calculateSkew(position, instrument.positionLimit, params.skewFactor);
  const raw = calculateRawQuotePrices(referencePrice, params.baseSpread, skew);

  return {
    type: "QUOTE",
    ticker: instrument.ticker,
    referencePrice,
    skew,
    buyPrice: alignToTick(raw.buyPrice, instrument.tickSize),
    sellPrice: alignToTick(raw.sellPrice, instrument.tickSize),
    size: calculateQuoteSize(params.baseOrderSize, position, instrument.positionLimit),
  };
}
