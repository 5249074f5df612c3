/**
 * Instrument normalization
 *
 * Turns harness product metadata into an InstrumentSpec once, at construction.
 */

import type { InstrumentSpec, PositionLimit, ProductInfo } from "./types";

/** Tick size used when the harness supplies none */
export const DEFAULT_TICK_SIZE = 1.0;

/**
 * Normalize a position limit
 *
 * Absent, zero, negative or non-finite limits are unbounded.
 */
export function toPositionLimit(posLimit: number | null | undefined): PositionLimit {
  if (posLimit === null || posLimit === undefined) return { kind: "unbounded" };
  if (!Number.isFinite(posLimit) || posLimit <= 0) return { kind: "unbounded" };
  return { kind: "bounded", value: posLimit };
}

export function toTickSize(mpv: number | null | undefined): number {
  if (mpv === null || mpv === undefined) return DEFAULT_TICK_SIZE;
  if (!Number.isFinite(mpv) || mpv <= 0) return DEFAULT_TICK_SIZE;
  return mpv;
}

export function normalizeInstrument(product: ProductInfo): InstrumentSpec {
  return {
    ticker: product.ticker,
    positionLimit: toPositionLimit(product.posLimit),
    tickSize: toTickSize(product.mpv),
  };
}
