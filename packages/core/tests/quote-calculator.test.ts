/**
 * Quote Calculator Unit Tests
 *
 * - inventory skew sign and magnitude
 * - raw quote prices
 * - tick alignment (half-up)
 * - full quote generation
 */

import { describe, expect, test } from "vitest";

import type { InstrumentBook, InstrumentSpec, StrategyParams } from "../src/types";
import { alignToTick, calculateRawQuotePrices, calculateSkew, generateQuote } from "../src/quote-calculator";

const createDefaultParams = (): StrategyParams => ({
  baseSpread: 1,
  skewFactor: 0.5,
  defaultReferencePrice: 1000,
  baseOrderSize: 5,
  haltedTickers: [],
});

const createInstrument = (overrides: Partial<InstrumentSpec> = {}): InstrumentSpec => ({
  ticker: "UEC",
  positionLimit: { kind: "bounded", value: 100 },
  tickSize: 0.25,
  ...overrides,
});

const createBook = (bid: number, ask: number): InstrumentBook => ({
  Bids: [{ price: bid, size: 3 }],
  Asks: [{ price: ask, size: 3 }],
});

describe("calculateSkew", () => {
  test("should return positive skew for a long position", () => {
    // (50 / 100) * 0.5 = 0.25
    expect(calculateSkew(50, { kind: "bounded", value: 100 }, 0.5)).toBe(0.25);
  });

  test("should return negative skew for a short position", () => {
    expect(calculateSkew(-50, { kind: "bounded", value: 100 }, 0.5)).toBe(-0.25);
  });

  test("should return zero skew for a flat position", () => {
    expect(calculateSkew(0, { kind: "bounded", value: 100 }, 0.5)).toBe(0);
  });

  test("should return zero skew when the limit is unbounded", () => {
    expect(calculateSkew(500, { kind: "unbounded" }, 0.5)).toBe(0);
  });
});

describe("calculateRawQuotePrices", () => {
  test("should place prices half a spread either side of the reference", () => {
    expect(calculateRawQuotePrices(100, 1, 0)).toEqual({ buyPrice: 99.5, sellPrice: 100.5 });
  });

  test("should subtract skew from both prices", () => {
    expect(calculateRawQuotePrices(100, 1, 0.25)).toEqual({ buyPrice: 99.25, sellPrice: 100.25 });
    expect(calculateRawQuotePrices(100, 1, -0.25)).toEqual({ buyPrice: 99.75, sellPrice: 100.75 });
  });
});

describe("alignToTick", () => {
  test("should round to the nearest tick multiple", () => {
    expect(alignToTick(100.26, 0.5)).toBe(100.5);
    expect(alignToTick(100.24, 0.5)).toBe(100);
  });

  test("should round ties half-up", () => {
    expect(alignToTick(100.25, 0.5)).toBe(100.5);
    expect(alignToTick(99.75, 0.5)).toBe(100);
    expect(alignToTick(999.5, 1)).toBe(1000);
  });

  test("should not drift on decimal tick sizes", () => {
    expect(alignToTick(0.3, 0.1)).toBe(0.3);
    expect(alignToTick(1.005, 0.01)).toBe(1.01);
  });

  test("should leave aligned prices unchanged", () => {
    expect(alignToTick(99.25, 0.25)).toBe(99.25);
  });
});

describe("generateQuote", () => {
  test("should quote symmetrically around mid when flat", () => {
    const result = generateQuote({
      instrument: createInstrument(),
      book: createBook(99, 101),
      position: 0,
      params: createDefaultParams(),
    });

    expect(result).toEqual({
      type: "QUOTE",
      ticker: "UEC",
      referencePrice: 100,
      skew: 0,
      buyPrice: 99.5,
      sellPrice: 100.5,
      size: 5,
    });
  });

  test("should shift both prices down by the skew when long half the limit", () => {
    const input = {
      instrument: createInstrument(),
      book: createBook(99, 101),
      params: createDefaultParams(),
    };

    const flat = generateQuote({ ...input, position: 0 });
    const long = generateQuote({ ...input, position: 50 });

    if (flat.type !== "QUOTE" || long.type !== "QUOTE") {
      throw new Error("expected quotes");
    }
    expect(long.skew).toBe(0.25);
    expect(flat.buyPrice - long.buyPrice).toBe(0.25);
    expect(flat.sellPrice - long.sellPrice).toBe(0.25);
  });

  test("should shift both prices up when short", () => {
    const result = generateQuote({
      instrument: createInstrument(),
      book: createBook(99, 101),
      position: -50,
      params: createDefaultParams(),
    });

    expect(result).toMatchObject({ buyPrice: 99.75, sellPrice: 100.75, size: 5 });
  });

  test("should use the default reference price and align to a whole tick", () => {
    const result = generateQuote({
      instrument: createInstrument({ tickSize: 1 }),
      book: undefined,
      position: 0,
      params: createDefaultParams(),
    });

    // 999.5 → 1000, 1000.5 → 1001 (ties half-up)
    expect(result).toMatchObject({ referencePrice: 1000, buyPrice: 1000, sellPrice: 1001 });
  });

  test("should reduce size and round skewed prices near the limit", () => {
    const result = generateQuote({
      instrument: createInstrument({ tickSize: 0.01 }),
      book: createBook(99, 101),
      position: 91,
      params: createDefaultParams(),
    });

    // skew = 0.91 * 0.5 = 0.455; buy 99.045 → 99.05, sell 100.045 → 100.05
    expect(result).toMatchObject({ skew: 0.455, buyPrice: 99.05, sellPrice: 100.05, size: 1 });
  });

  test("should ignore skew and size reduction when unbounded", () => {
    const result = generateQuote({
      instrument: createInstrument({ positionLimit: { kind: "unbounded" } }),
      book: createBook(99, 101),
      position: 500,
      params: createDefaultParams(),
    });

    expect(result).toMatchObject({ skew: 0, buyPrice: 99.5, sellPrice: 100.5, size: 5 });
  });

  test("should return NO_QUOTE for a halted ticker", () => {
    const result = generateQuote({
      instrument: createInstrument(),
      book: createBook(99, 101),
      position: 0,
      params: { ...createDefaultParams(), haltedTickers: ["UEC"] },
    });

    expect(result).toEqual({ type: "NO_QUOTE", ticker: "UEC", reason: "TICKER_HALTED" });
  });
});
