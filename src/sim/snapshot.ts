import type { Account, Order, OrderSnapshot, PositionSnapshot, Snapshot } from "../types.js";
import { type Decimal, round2 } from "../utils/decimal.js";
import type { Position } from "./position.js";

export interface SnapshotInput {
  symbol: string;
  price: Decimal;
  account: Account;
  position: Position;
  orders: readonly Order[];
  requestedLeverage: number;
  now: Date;
}

export function positionSnapshot(
  position: Position,
  price: Decimal,
  feeRate: Decimal
): PositionSnapshot | null {
  if (position.side === "flat") return null;
  return {
    side: position.side,
    quantity: position.quantity.toString(),
    entryPrice: round2(position.entryPrice),
    leverage: position.leverage,
    liquidationPrice: round2(position.liquidationPrice(feeRate)),
    pnl: round2(position.pnl(price)),
    margin: round2(position.margin(price)),
  };
}

export function orderSnapshot(order: Order): OrderSnapshot {
  return {
    id: order.id,
    side: order.side,
    type: order.limitPrice ? "limit" : "market",
    quantity: order.quantity.toString(),
    price: order.limitPrice ? order.limitPrice.toNumber() : null,
    createdAt: new Date(order.createdAt).toISOString(),
  };
}

/**
 * Build the published account state. This is the only place state is rounded.
 */
export function buildSnapshot(input: SnapshotInput): Snapshot {
  const { account, position, price } = input;
  const totalValue = account.balance.plus(position.value(price, account.feeRate));
  return {
    symbol: input.symbol,
    timestamp: input.now.toISOString(),
    price: price.toNumber(),
    balance: round2(account.balance),
    totalValue: round2(totalValue),
    leverage: input.requestedLeverage,
    position: positionSnapshot(position, price, account.feeRate),
    openOrders: input.orders.map(orderSnapshot),
  };
}
