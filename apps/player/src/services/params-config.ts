/**
 * Params Config - Strategy params from the environment
 */

import type { StrategyParamsInput } from "@mm-plugin/core";

import type { Env } from "../env";

/**
 * Map env variables onto raw (unvalidated) strategy params
 */
export function paramsFromEnv(
  env: Pick<
    Env,
    | "QUOTE_BASE_SPREAD"
    | "QUOTE_SKEW_FACTOR"
    | "QUOTE_DEFAULT_REFERENCE_PRICE"
    | "QUOTE_BASE_ORDER_SIZE"
    | "QUOTE_HALTED_TICKERS"
  >,
): StrategyParamsInput {
  return {
    baseSpread: env.QUOTE_BASE_SPREAD,
    skewFactor: env.QUOTE_SKEW_FACTOR,
    defaultReferencePrice: env.QUOTE_DEFAULT_REFERENCE_PRICE,
    baseOrderSize: env.QUOTE_BASE_ORDER_SIZE,
    haltedTickers: parseTickerList(env.QUOTE_HALTED_TICKERS),
  };
}

/**
 * "A, B,,C" → ["A", "B", "C"]
 */
export function parseTickerList(value: string): string[] {
  return value
    .split(",")
    .map(t => t.trim())
    .filter(t => t.length > 0);
}
