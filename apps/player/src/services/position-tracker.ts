/**
 * Position Tracker - In-memory net position per ticker
 *
 * Positive = long, negative = short. Only trade settlement changes it.
 */

import type { Ticker } from "@mm-plugin/core";

/**
 * Position Tracker
 */
export class PositionTracker {
  private positions: Map<Ticker, number> = new Map();

  constructor(tickers: readonly Ticker[] = []) {
    for (const ticker of tickers) {
      this.positions.set(ticker, 0);
    }
  }

  /**
   * Current position, 0 for tickers never traded
   */
  getPosition(ticker: Ticker): number {
    return this.positions.get(ticker) ?? 0;
  }

  /**
   * Apply a signed fill: +size bought, -size sold
   *
   * @returns position after the fill
   */
  applyFill(ticker: Ticker, signedSize: number): number {
    const next = this.getPosition(ticker) + signedSize;
    this.positions.set(ticker, next);
    return next;
  }

  /**
   * Copy of every tracked position
   */
  snapshot(): Record<Ticker, number> {
    return Object.fromEntries(this.positions);
  }
}
