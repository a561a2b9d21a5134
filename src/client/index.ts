import type { CommandChannel } from "../store/types.js";
import type { OrderSnapshot, PositionSnapshot, Side, Snapshot } from "../types.js";
import type { Decimal } from "../utils/decimal.js";
import { logger } from "../utils/logger.js";

export interface AccountSummary {
  balance: number;
  /** Balance plus the position's value after closing fees */
  value: number;
}

/**
 * Control client for a running simulator.
 *
 * Reads come from the latest published snapshot; writes go into the command
 * slots and take effect on the engine's next tick. Submitting twice within
 * one tick replaces the first submission.
 */
export class SimulatorClient {
  constructor(private readonly channel: CommandChannel) {}

  /** Latest published state, null until the engine has ticked */
  getSnapshot(): Snapshot | null {
    return this.channel.latest();
  }

  getPrice(): number | null {
    return this.getSnapshot()?.price ?? null;
  }

  getAccount(): AccountSummary | null {
    const snapshot = this.getSnapshot();
    if (!snapshot) return null;
    return { balance: snapshot.balance, value: snapshot.totalValue };
  }

  /**
   * Request a leverage change; it only takes effect while there is no open position
   */
  setLeverage(leverage: number): void {
    this.channel.requestLeverage(leverage);
  }

  /**
   * Submit a market order, or a limit order when a price is given
   */
  submitOrder(side: Side, quantity: Decimal.Value, price?: Decimal.Value): void {
    this.channel.submitOrder({ side, quantity, price: price ?? null });
    logger.debug(`Submitted ${side} ${quantity}${price === undefined ? "" : ` @ ${price}`}`);
  }

  getOrders(): OrderSnapshot[] {
    return this.getSnapshot()?.openOrders ?? [];
  }

  cancelOrder(id: number): boolean {
    return this.channel.cancelOrder(id);
  }

  /**
   * Submit an order for the whole open position in the opposite direction.
   * Returns false when there is no position to close.
   */
  closePosition(price?: Decimal.Value): boolean {
    const position = this.getPosition();
    if (!position) return false;
    const side: Side = position.side === "long" ? "sell" : "buy";
    this.submitOrder(side, position.quantity, price);
    return true;
  }

  getPosition(): PositionSnapshot | null {
    return this.getSnapshot()?.position ?? null;
  }
}
