import type { Order, OrderRequest } from "../types.js";
import type { Decimal } from "../utils/decimal.js";

/**
 * Whether an order can trade at the given tick price.
 * Market orders always can; a limit buy needs price <= limit, a limit sell price >= limit.
 */
export function isEligible(order: OrderRequest, price: Decimal): boolean {
  if (!order.limitPrice) return true;
  return order.side === "buy" ? price.lte(order.limitPrice) : price.gte(order.limitPrice);
}

/**
 * Pending orders in submission order. Ids start at 1 and are never reused.
 */
export class OrderQueue {
  private orders: Order[] = [];
  private lastId = 0;

  submit(request: OrderRequest, now: number = Date.now()): Order {
    this.lastId += 1;
    const order: Order = {
      id: this.lastId,
      side: request.side,
      quantity: request.quantity,
      createdAt: now,
    };
    if (request.limitPrice) {
      order.limitPrice = request.limitPrice;
    }
    this.orders.push(order);
    return order;
  }

  /** Remove an order on client request */
  cancel(id: number): boolean {
    return this.remove(id);
  }

  /** Remove an order after it filled or was rejected */
  remove(id: number): boolean {
    const index = this.orders.findIndex((order) => order.id === id);
    if (index < 0) return false;
    this.orders.splice(index, 1);
    return true;
  }

  get(id: number): Order | undefined {
    return this.orders.find((order) => order.id === id);
  }

  eligible(price: Decimal): Order[] {
    return this.orders.filter((order) => isEligible(order, price));
  }

  list(): readonly Order[] {
    return this.orders;
  }

  get size(): number {
    return this.orders.length;
  }
}
