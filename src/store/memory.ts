import type { OrderInput, OrderRequest, Snapshot } from "../types.js";
import { logger } from "../utils/logger.js";
import type { CommandChannel, PendingCommands, StateStore } from "./types.js";
import { MAX_LEVERAGE, parseLeverage, parseOrderId, parseOrderInput } from "./validation.js";

/**
 * In-process command channel and snapshot holder.
 * One slot for an order, one for a leverage change; the engine empties them each tick.
 */
export class MemoryStateStore implements StateStore, CommandChannel {
  private order: OrderRequest | null = null;
  private leverage: number | null = null;
  private cancellations = new Set<number>();
  private snapshot: Snapshot | null = null;

  constructor(private readonly maxLeverage = MAX_LEVERAGE) {}

  submitOrder(input: OrderInput): void {
    const order = parseOrderInput(input);
    if (this.order) {
      logger.debug("Pending order replaced before the engine took it");
    }
    this.order = order;
  }

  requestLeverage(leverage: number): void {
    this.leverage = parseLeverage(leverage, this.maxLeverage);
  }

  cancelOrder(id: number): boolean {
    const orderId = parseOrderId(id);
    const open = this.snapshot?.openOrders.some((order) => order.id === orderId) ?? false;
    if (!open || this.cancellations.has(orderId)) {
      return false;
    }
    this.cancellations.add(orderId);
    return true;
  }

  latest(): Snapshot | null {
    return this.snapshot;
  }

  takeCommands(): PendingCommands {
    const commands: PendingCommands = {
      order: this.order,
      leverage: this.leverage,
      cancellations: [...this.cancellations],
    };
    this.order = null;
    this.leverage = null;
    this.cancellations.clear();
    return commands;
  }

  publish(snapshot: Snapshot): void {
    this.snapshot = snapshot;
  }

  reset(): void {
    this.takeCommands();
    this.snapshot = null;
  }
}
