/**
 * Refresh Quotes - One quoting turn
 *
 * - Cancel every open order (all instruments)
 * - Quote every instrument: buy then sell
 *
 * The previous quote set is replaced unconditionally; there is no diffing.
 */

import type { BookSnapshot, InstrumentSpec, Message, StrategyParams } from "@mm-plugin/core";
import { generateQuote, limitUtilization } from "@mm-plugin/core";
import type { Logger } from "@mm-plugin/utils";

import type { MessageFactory } from "../services/message-factory";
import type { OrderTracker } from "../services/order-tracker";
import type { PositionTracker } from "../services/position-tracker";

export interface RefreshQuotesDeps {
  instruments: readonly InstrumentSpec[];
  params: StrategyParams;
  orderTracker: OrderTracker;
  positionTracker: PositionTracker;
  messageFactory: MessageFactory;
  log: Logger;
}

/**
 * Build this turn's messages
 *
 * @returns all REMOVE messages first, then ORDER messages per instrument
 *          in construction order, buy before sell
 */
export function refreshQuotes(deps: RefreshQuotesDeps, book: BookSnapshot): Message[] {
  const { instruments, params, orderTracker, positionTracker, messageFactory, log } = deps;
  const messages: Message[] = [];

  // ─────────────────────────────────────────────────────────────────────────
  // Phase 1: cancel everything still resting
  // ─────────────────────────────────────────────────────────────────────────
  for (const orderId of orderTracker.drain()) {
    messages.push(messageFactory.createRemoveMessage(orderId));
  }
  const cancelCount = messages.length;

  // ─────────────────────────────────────────────────────────────────────────
  // Phase 2: fresh quotes
  // ─────────────────────────────────────────────────────────────────────────
  for (const instrument of instruments) {
    const position = positionTracker.getPosition(instrument.ticker);
    const decision = generateQuote({
      instrument,
      book: book[instrument.ticker],
      position,
      params,
    });

    if (decision.type === "NO_QUOTE") {
      log.debug("Skipping quote", { ticker: decision.ticker, reason: decision.reason });
      continue;
    }

    const buy = messageFactory.createOrderMessage(decision.ticker, "Buy", decision.size, decision.buyPrice);
    const sell = messageFactory.createOrderMessage(decision.ticker, "Sell", decision.size, decision.sellPrice);

    for (const { order } of [buy, sell]) {
      orderTracker.addOrder({
        orderId: order.orderId,
        ticker: order.ticker,
        direction: order.direction,
        size: order.size,
        price: order.price,
      });
    }
    messages.push(buy, sell);

    log.debug("Quoted", {
      ticker: decision.ticker,
      ref: decision.referencePrice,
      skew: decision.skew,
      bid: decision.buyPrice,
      ask: decision.sellPrice,
      size: decision.size,
      position,
      limitUsed: limitUtilization(position, instrument.positionLimit) ?? "unbounded",
    });
  }

  log.debug("Turn messages built", { cancels: cancelCount, orders: messages.length - cancelCount });

  return messages;
}
