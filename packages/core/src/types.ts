/**
 * Core Domain Types
 *
 * Pure type definitions for the quoting engine and the harness boundary.
 * No I/O dependencies, no side effects.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Instrument identifier as used by the exchange harness */
export type Ticker = string;

/** Order identifier, assigned by this component from a single counter */
export type OrderId = number;

/** Direction of an order as spelled on the harness wire */
export type Direction = "Buy" | "Sell";

/**
 * Position limit
 *
 * Unbounded is an explicit variant so that no Infinity sentinel
 * ever reaches the skew or size arithmetic.
 */
export type PositionLimit = { kind: "bounded"; value: number } | { kind: "unbounded" };

// ─────────────────────────────────────────────────────────────────────────────
// Instruments
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Product metadata as supplied by the harness at construction
 */
export interface ProductInfo {
  ticker: Ticker;
  /** Position limit; null or absent means unbounded */
  posLimit?: number | null;
  /** Minimum price variance (tick size) */
  mpv?: number | null;
}

/**
 * Normalized instrument configuration (immutable for the session)
 */
export interface InstrumentSpec {
  readonly ticker: Ticker;
  readonly positionLimit: PositionLimit;
  readonly tickSize: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Order Book
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A resting level in the book
 */
export interface BookLevel {
  price: number;
  size: number;
}

/**
 * One instrument's side of the book, best price first on each side
 */
export interface InstrumentBook {
  Bids?: readonly BookLevel[];
  Asks?: readonly BookLevel[];
}

/**
 * Full snapshot keyed by ticker (read-only input)
 */
export type BookSnapshot = Readonly<Record<Ticker, InstrumentBook | undefined>>;

// ─────────────────────────────────────────────────────────────────────────────
// Trades
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Settled trade as reported by the harness
 */
export interface Trade {
  ticker: Ticker;
  size: number;
  price?: number;
  /** Name of the bot that sent the crossing order */
  aggBot: string;
  aggDir: Direction;
  aggOrderId: OrderId;
  /** Name of the bot whose resting order was hit */
  restBot: string;
  restOrderId: OrderId;
}

// ─────────────────────────────────────────────────────────────────────────────
// Orders & Messages
// ─────────────────────────────────────────────────────────────────────────────

/**
 * An order this component currently has live at the exchange
 */
export interface RestingOrder {
  orderId: OrderId;
  ticker: Ticker;
  direction: Direction;
  size: number;
  price: number;
}

/**
 * Order payload of an ORDER message
 */
export interface OrderPayload {
  ticker: Ticker;
  price: number;
  size: number;
  orderId: OrderId;
  direction: Direction;
  botName: string;
}

export interface OrderMessage {
  kind: "ORDER";
  order: OrderPayload;
}

export interface RemoveMessage {
  kind: "REMOVE";
  orderId: OrderId;
}

export type Message = OrderMessage | RemoveMessage;

// ─────────────────────────────────────────────────────────────────────────────
// Strategy Parameters
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Quoting parameters shared by every instrument
 */
export interface StrategyParams {
  /** Total quoted width between buy and sell before skew and rounding */
  baseSpread: number;

  /** Skew applied when the position sits exactly at its limit */
  skewFactor: number;

  /** Reference price used when the book has neither bids nor asks */
  defaultReferencePrice: number;

  /** Order size before the near-limit reduction */
  baseOrderSize: number;

  /** Tickers the configuration disallows quoting */
  haltedTickers: readonly Ticker[];
}

// ─────────────────────────────────────────────────────────────────────────────
// Quote Decision (output of the quoting engine)
// ─────────────────────────────────────────────────────────────────────────────

export type NoQuoteReason = "TICKER_HALTED";

export interface QuoteIntent {
  type: "QUOTE";
  ticker: Ticker;
  referencePrice: number;
  skew: number;
  buyPrice: number;
  sellPrice: number;
  size: number;
}

export interface NoQuoteIntent {
  type: "NO_QUOTE";
  ticker: Ticker;
  reason: NoQuoteReason;
}

export type QuoteDecision = QuoteIntent | NoQuoteIntent;

/**
 * Input for a single instrument's quote
 */
export interface QuoteInput {
  instrument: InstrumentSpec;
  book: InstrumentBook | undefined;
  position: number;
  params: StrategyParams;
}
