/**
 * Message Factory - ORDER and REMOVE message construction
 */

import type { Direction, OrderMessage, RemoveMessage, Ticker, OrderId } from "@mm-plugin/core";

import type { OrderIdSequence } from "./order-id-sequence";

export class MessageFactory {
  constructor(
    private readonly botName: string,
    private readonly ids: OrderIdSequence,
  ) {}

  /**
   * Build an ORDER message, consuming one id from the sequence
   */
  createOrderMessage(ticker: Ticker, direction: Direction, size: number, price: number): OrderMessage {
    return {
      kind: "ORDER",
      order: {
        ticker,
        price,
        size,
        orderId: this.ids.next(),
        direction,
        botName: this.botName,
      },
    };
  }

  /**
   * Build a cancel for an existing order
   */
  createRemoveMessage(orderId: OrderId): RemoveMessage {
    return { kind: "REMOVE", orderId };
  }
}
