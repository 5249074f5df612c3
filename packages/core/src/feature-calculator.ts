/**
 * Feature Calculator - Reference price from the order book
 *
 * - best bid / best ask extraction
 * - mid price with one-sided and empty-book fallbacks
 *
 * This module is pure (no I/O, no throw).
 */

import type { BookLevel, InstrumentBook } from "./types";

/**
 * Best bid price, or undefined when there are no bids
 */
export function bestBidPrice(book: InstrumentBook | undefined): number | undefined {
  return topOfSide(book?.Bids);
}

/**
 * Best ask price, or undefined when there are no asks
 */
export function bestAskPrice(book: InstrumentBook | undefined): number | undefined {
  return topOfSide(book?.Asks);
}

function topOfSide(levels: readonly BookLevel[] | undefined): number | undefined {
  if (!levels || levels.length === 0) return undefined;
  return levels[0].price;
}

/**
 * Calculate mid price
 *
 * mid = (best_bid + best_ask) / 2
 */
export function calculateMid(bestBid: number, bestAsk: number): number {
  return (bestBid + bestAsk) / 2;
}

/**
 * Calculate the reference price for quoting
 *
 * First matching rule wins:
 * 1. bid and ask → mid
 * 2. bids only → best bid
 * 3. asks only → best ask
 * 4. empty book → defaultPrice
 *
 * @param book - The instrument's book (may be absent from the snapshot)
 * @param defaultPrice - Fallback when neither side has a level
 */
export function calculateReferencePrice(book: InstrumentBook | undefined, defaultPrice: number): number {
  const bid = bestBidPrice(book);
  const ask = bestAskPrice(book);

  if (bid !== undefined && ask !== undefined) {
    return calculateMid(bid, ask);
  }
  if (bid !== undefined) {
    return bid;
  }
  if (ask !== undefined) {
    return ask;
  }
  return defaultPrice;
}
