/**
 * Order Tracker - In-memory tracking of resting orders
 *
 * - Record every order this component emits
 * - Drop orders on cancel or fill
 */

import type { OrderId, RestingOrder } from "@mm-plugin/core";

/**
 * Order Tracker
 *
 * Keyed by order id; iteration follows insertion (emission) order.
 */
export class OrderTracker {
  private orders: Map<OrderId, RestingOrder> = new Map();

  /**
   * Add a newly emitted order
   */
  addOrder(order: RestingOrder): void {
    this.orders.set(order.orderId, { ...order });
  }

  /**
   * Remove a single order
   *
   * @returns false when the id was not tracked (already removed or never ours)
   */
  removeOrder(orderId: OrderId): boolean {
    return this.orders.delete(orderId);
  }

  /**
   * Get order by id
   */
  getOrder(orderId: OrderId): RestingOrder | undefined {
    return this.orders.get(orderId);
  }

  /**
   * Open order ids in emission order
   */
  getOpenOrderIds(): OrderId[] {
    return Array.from(this.orders.keys());
  }

  /**
   * Open orders in emission order
   */
  getOpenOrders(): RestingOrder[] {
    return Array.from(this.orders.values(), order => ({ ...order }));
  }

  get size(): number {
    return this.orders.size;
  }

  /**
   * Clear all orders, returning their ids in emission order (for cancel-all)
   */
  drain(): OrderId[] {
    const ids = this.getOpenOrderIds();
    this.orders.clear();
    return ids;
  }
}
