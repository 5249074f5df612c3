/**
 * Position Tracker Unit Tests
 */

import { describe, expect, test } from "vitest";

import { PositionTracker } from "../../src/services/position-tracker";

describe("PositionTracker", () => {
  test("should start flat for configured tickers", () => {
    const tracker = new PositionTracker(["UEC", "SOBER"]);

    expect(tracker.snapshot()).toEqual({ UEC: 0, SOBER: 0 });
  });

  test("should read 0 for a ticker never seen", () => {
    expect(new PositionTracker().getPosition("UEC")).toBe(0);
  });

  test("applyFill should accumulate signed sizes", () => {
    const tracker = new PositionTracker(["UEC"]);

    expect(tracker.applyFill("UEC", 3)).toBe(3);
    expect(tracker.applyFill("UEC", -5)).toBe(-2);
    expect(tracker.getPosition("UEC")).toBe(-2);
  });

  test("applyFill should start tracking an unknown ticker", () => {
    const tracker = new PositionTracker(["UEC"]);

    tracker.applyFill("SOBER", 4);

    expect(tracker.snapshot()).toEqual({ UEC: 0, SOBER: 4 });
  });
});
