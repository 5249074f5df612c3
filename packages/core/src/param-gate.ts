/**
 * ParamGate - Strategy parameter validation
 *
 * - Schema validation with defaults for unspecified fields
 * - Returns Result instead of throwing
 */

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

import type { StrategyParams } from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_STRATEGY_PARAMS: StrategyParams = {
  baseSpread: 1.0,
  skewFactor: 0.5,
  defaultReferencePrice: 1000,
  baseOrderSize: 5,
  haltedTickers: [],
};

// ─────────────────────────────────────────────────────────────────────────────
// Schema
// ─────────────────────────────────────────────────────────────────────────────

export const StrategyParamsSchema = z.object({
  baseSpread: z.number().nonnegative().default(DEFAULT_STRATEGY_PARAMS.baseSpread),
  skewFactor: z.number().default(DEFAULT_STRATEGY_PARAMS.skewFactor),
  defaultReferencePrice: z.number().positive().default(DEFAULT_STRATEGY_PARAMS.defaultReferencePrice),
  baseOrderSize: z.number().int().positive().default(DEFAULT_STRATEGY_PARAMS.baseOrderSize),
  haltedTickers: z.array(z.string().min(1)).default([]),
});

export type StrategyParamsInput = z.input<typeof StrategyParamsSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export type ParamGateError = { type: "INVALID_PARAMS"; issues: string[] };

// ─────────────────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Validate strategy parameters, filling defaults for missing fields
 *
 * Issues are reported as "path: message" strings, one per failed field.
 */
export function validateStrategyParams(input: unknown): Result<StrategyParams, ParamGateError> {
  const parsed = StrategyParamsSchema.safeParse(input ?? {});

  if (!parsed.success) {
    return err({
      type: "INVALID_PARAMS",
      issues: parsed.error.issues.map(issue => `${issue.path.map(String).join(".")}: ${issue.message}`),
    });
  }

  return ok(parsed.data);
}
