/**
 * Player Algorithm - Harness-facing market maker
 *
 * Quotes a resting buy and sell around the reference price of every
 * instrument each turn, skewed against inventory and shrunk near the
 * position limit.
 *
 * Calling contract: the harness calls `setIdx` once, then alternates
 * `sendMessages` and `processTrades`, strictly one call at a time. The
 * ledger has no locking; a concurrent host must serialize every call on
 * an instance.
 */

import { err, ok, type Result } from "neverthrow";
import type {
  BookSnapshot,
  InstrumentSpec,
  Message,
  OrderId,
  ParamGateError,
  ProductInfo,
  RestingOrder,
  StrategyParams,
  Ticker,
  Trade,
} from "@mm-plugin/core";
import { DEFAULT_STRATEGY_PARAMS, normalizeInstrument, validateStrategyParams } from "@mm-plugin/core";
import { createScopedLogger, type Logger } from "@mm-plugin/utils";

import { MessageFactory } from "./services/message-factory";
import { OrderIdSequence } from "./services/order-id-sequence";
import { OrderTracker } from "./services/order-tracker";
import { PositionTracker } from "./services/position-tracker";
import { processTrades } from "./usecases/process-trades";
import { refreshQuotes } from "./usecases/refresh-quotes";

export const DEFAULT_PLAYER_NAME = "MarketMakerBot";

export interface PlayerOptions {
  /** Bot name on orders and in trade reports */
  name?: string;
  params?: StrategyParams;
  log?: Logger;
}

export class PlayerAlgorithm {
  readonly name: string;
  readonly instruments: readonly InstrumentSpec[];
  readonly params: StrategyParams;

  private readonly ids = new OrderIdSequence();
  private readonly orderTracker = new OrderTracker();
  private readonly positionTracker: PositionTracker;
  private readonly messageFactory: MessageFactory;
  private readonly log: Logger;
  private turnCount = 0;

  constructor(products: readonly ProductInfo[], options: PlayerOptions = {}) {
    this.name = options.name ?? DEFAULT_PLAYER_NAME;
    this.params = options.params ?? DEFAULT_STRATEGY_PARAMS;
    this.log = options.log ?? createScopedLogger(this.name);
    this.instruments = products.map(normalizeInstrument);
    this.positionTracker = new PositionTracker(this.instruments.map(i => i.ticker));
    this.messageFactory = new MessageFactory(this.name, this.ids);

    this.log.info("Player initialized", {
      tickers: this.instruments.map(i => i.ticker),
      params: this.params,
    });
  }

  /**
   * Set the starting order id; called once before the first turn
   */
  setIdx(idx: OrderId): void {
    this.ids.seed(idx);
  }

  /**
   * One turn: cancel all open orders, then quote every instrument
   */
  sendMessages(book: BookSnapshot): Message[] {
    const messages = refreshQuotes(
      {
        instruments: this.instruments,
        params: this.params,
        orderTracker: this.orderTracker,
        positionTracker: this.positionTracker,
        messageFactory: this.messageFactory,
        log: this.log,
      },
      book,
    );
    this.turnCount += 1;
    return messages;
  }

  /**
   * Settle trades into positions and the open-order set
   */
  processTrades(trades: readonly Trade[]): void {
    processTrades(
      {
        botName: this.name,
        orderTracker: this.orderTracker,
        positionTracker: this.positionTracker,
        log: this.log,
      },
      trades,
    );
  }

  getPosition(ticker: Ticker): number {
    return this.positionTracker.getPosition(ticker);
  }

  getPositions(): Record<Ticker, number> {
    return this.positionTracker.snapshot();
  }

  getOpenOrders(): RestingOrder[] {
    return this.orderTracker.getOpenOrders();
  }

  getOpenOrder(orderId: OrderId): RestingOrder | undefined {
    return this.orderTracker.getOrder(orderId);
  }

  /** Id the next ORDER message will carry */
  getNextOrderId(): OrderId {
    return this.ids.peek();
  }

  getTurnCount(): number {
    return this.turnCount;
  }
}

/**
 * Build a player from unvalidated params
 */
export function createPlayerAlgorithm(
  products: readonly ProductInfo[],
  rawParams: unknown,
  options: Omit<PlayerOptions, "params"> = {},
): Result<PlayerAlgorithm, ParamGateError> {
  const params = validateStrategyParams(rawParams);
  if (params.isErr()) {
    return err(params.error);
  }
  return ok(new PlayerAlgorithm(products, { ...options, params: params.value }));
}
