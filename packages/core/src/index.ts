/**
 * packages/core - Pure Quoting Logic
 *
 * This package contains all pure business logic for the market-making plugin.
 * NO I/O dependencies (DB, HTTP, WS, FS).
 * NO exceptions thrown (uses Result types where needed).
 */

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export type {
  // Value objects
  Ticker,
  OrderId,
  Direction,
  PositionLimit,
  // Instruments
  ProductInfo,
  InstrumentSpec,
  // Market data
  BookLevel,
  InstrumentBook,
  BookSnapshot,
  Trade,
  // Orders & messages
  RestingOrder,
  OrderPayload,
  OrderMessage,
  RemoveMessage,
  Message,
  // Strategy
  StrategyParams,
  // Decision
  NoQuoteReason,
  QuoteIntent,
  NoQuoteIntent,
  QuoteDecision,
  QuoteInput,
} from "./types";

// ─────────────────────────────────────────────────────────────────────────────
// Instruments
// ─────────────────────────────────────────────────────────────────────────────
export { normalizeInstrument, toPositionLimit, toTickSize, DEFAULT_TICK_SIZE } from "./instrument";

// ─────────────────────────────────────────────────────────────────────────────
// Risk Policy
// ─────────────────────────────────────────────────────────────────────────────
export { calculateQuoteSize, limitUtilization, HALF_SIZE_THRESHOLD, MIN_SIZE_THRESHOLD } from "./risk-policy";

// ─────────────────────────────────────────────────────────────────────────────
// Quote Calculator
// ─────────────────────────────────────────────────────────────────────────────
export { calculateSkew, calculateRawQuotePrices, alignToTick, generateQuote } from "./quote-calculator";

// ─────────────────────────────────────────────────────────────────────────────
// Feature Calculator
// ─────────────────────────────────────────────────────────────────────────────
export { bestBidPrice, bestAskPrice, calculateMid, calculateReferencePrice } from "./feature-calculator";

// ─────────────────────────────────────────────────────────────────────────────
// ParamGate
// ─────────────────────────────────────────────────────────────────────────────
export type { ParamGateError, StrategyParamsInput } from "./param-gate";
export { validateStrategyParams, StrategyParamsSchema, DEFAULT_STRATEGY_PARAMS } from "./param-gate";
