/**
 * Risk Policy - Order sizing near the position limit
 *
 * - |pos| > 80% of limit → half size (floor, min 1)
 * - |pos| > 90% of limit → size 1
 * - unbounded limit → base size
 *
 * Both thresholds are checked against the same position, in ascending
 * order of strictness, so the stricter one wins.
 *
 * This module is pure (no I/O, no throw).
 */

import type { PositionLimit } from "./types";

/** Fraction of the limit above which the size is halved */
export const HALF_SIZE_THRESHOLD = 0.8;

/** Fraction of the limit above which the size is forced to 1 */
export const MIN_SIZE_THRESHOLD = 0.9;

/**
 * Calculate order size for both sides of a quote
 *
 * @param baseSize - Configured base order size
 * @param position - Current signed position
 * @param limit - Instrument position limit
 * @returns Size to quote on each side
 */
export function calculateQuoteSize(baseSize: number, position: number, limit: PositionLimit): number {
  if (limit.kind === "unbounded") {
    return baseSize;
  }

  const absPosition = Math.abs(position);
  let size = baseSize;

  if (absPosition > HALF_SIZE_THRESHOLD * limit.value) {
    size = Math.max(1, Math.floor(baseSize / 2));
  }
  if (absPosition > MIN_SIZE_THRESHOLD * limit.value) {
    size = 1;
  }

  return size;
}

/**
 * Fraction of the limit currently used, for diagnostics
 *
 * @returns |pos| / limit, or undefined when unbounded
 */
export function limitUtilization(position: number, limit: PositionLimit): number | undefined {
  if (limit.kind === "unbounded") return undefined;
  return Math.abs(position) / limit.value;
}
