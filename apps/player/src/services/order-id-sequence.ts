/**
 * Order Id Sequence - Single monotonically increasing counter
 *
 * Seeded once by the harness before the first turn. Only ORDER messages
 * draw from it; REMOVE messages reuse the id of the order they cancel.
 */

import type { OrderId } from "@mm-plugin/core";

export class OrderIdSequence {
  private current: OrderId;

  constructor(start: OrderId = 0) {
    this.current = start;
  }

  /**
   * Set the starting id for the session
   */
  seed(start: OrderId): void {
    this.current = start;
  }

  /**
   * Take the current id and advance by one
   */
  next(): OrderId {
    const id = this.current;
    this.current += 1;
    return id;
  }

  /**
   * Id the next order will receive
   */
  peek(): OrderId {
    return this.current;
  }
}
