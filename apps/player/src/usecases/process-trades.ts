/**
 * Process Trades - Settle fills into the ledger
 *
 * - Aggressor: +size on Buy, -size on Sell
 * - Resting: the opposite sign (the aggressor's Buy was our sell)
 * - Self-trade: both roles apply, independently
 * - Unknown order ids are ignored
 */

import type { Direction, OrderId, Trade } from "@mm-plugin/core";
import type { Logger } from "@mm-plugin/utils";

import type { OrderTracker } from "../services/order-tracker";
import type { PositionTracker } from "../services/position-tracker";

export interface ProcessTradesDeps {
  botName: string;
  orderTracker: OrderTracker;
  positionTracker: PositionTracker;
  log: Logger;
}

type Role = "aggressor" | "resting";

function signedSize(direction: Direction, size: number): number {
  return direction === "Buy" ? size : -size;
}

export function processTrades(deps: ProcessTradesDeps, trades: readonly Trade[]): void {
  const { botName, orderTracker, positionTracker, log } = deps;

  const settle = (trade: Trade, role: Role, delta: number, orderId: OrderId): void => {
    const position = positionTracker.applyFill(trade.ticker, delta);
    const removed = orderTracker.removeOrder(orderId);
    log.debug("Fill", { ticker: trade.ticker, role, delta, position, orderId, tracked: removed });
  };

  for (const trade of trades) {
    if (trade.aggBot === botName) {
      settle(trade, "aggressor", signedSize(trade.aggDir, trade.size), trade.aggOrderId);
    }

    if (trade.restBot === botName) {
      settle(trade, "resting", -signedSize(trade.aggDir, trade.size), trade.restOrderId);
    }
  }
}
