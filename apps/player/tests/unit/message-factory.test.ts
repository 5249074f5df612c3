/**
 * Message Factory / Order Id Sequence Unit Tests
 */

import { describe, expect, test } from "vitest";

import { MessageFactory } from "../../src/services/message-factory";
import { OrderIdSequence } from "../../src/services/order-id-sequence";

describe("OrderIdSequence", () => {
  test("next should return the seed then count up by one", () => {
    const ids = new OrderIdSequence();
    ids.seed(500);

    expect([ids.next(), ids.next(), ids.next()]).toEqual([500, 501, 502]);
    expect(ids.peek()).toBe(503);
  });

  test("should default to 0", () => {
    expect(new OrderIdSequence().next()).toBe(0);
  });
});

describe("MessageFactory", () => {
  test("createOrderMessage should stamp the bot name and consume an id", () => {
    const ids = new OrderIdSequence(42);
    const factory = new MessageFactory("TestBot", ids);

    const message = factory.createOrderMessage("UEC", "Sell", 5, 100.5);

    expect(message).toEqual({
      kind: "ORDER",
      order: { ticker: "UEC", price: 100.5, size: 5, orderId: 42, direction: "Sell", botName: "TestBot" },
    });
    expect(ids.peek()).toBe(43);
  });

  test("createRemoveMessage should not consume an id", () => {
    const ids = new OrderIdSequence(42);
    const factory = new MessageFactory("TestBot", ids);

    expect(factory.createRemoveMessage(7)).toEqual({ kind: "REMOVE", orderId: 7 });
    expect(ids.peek()).toBe(42);
  });
});
