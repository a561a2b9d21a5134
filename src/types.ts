// Shared types used across the simulator

import type { Decimal } from "./utils/decimal.js";

export type Side = "buy" | "sell";
export type PositionSide = "long" | "short" | "flat";
export type OrderType = "limit" | "market";

/**
 * A validated order, not yet queued. No limit price means a market order.
 */
export interface OrderRequest {
  side: Side;
  quantity: Decimal;
  limitPrice?: Decimal;
}

export interface Order extends OrderRequest {
  id: number;
  createdAt: number; // Unix timestamp in milliseconds
}

/**
 * Order as submitted by a client, before validation
 */
export interface OrderInput {
  side: string;
  quantity: Decimal.Value;
  price?: Decimal.Value | null;
}

export interface Account {
  balance: Decimal; // Quote funds not committed as margin
  feeRate: Decimal; // Fraction of notional charged on every fill
  minNotional: Decimal; // Smallest order value (quantity * price / leverage) accepted
}

/**
 * How a limit order is priced once the tick crosses its limit.
 * "limit" fills at the limit price, "tick" at the tick price.
 */
export type LimitFillPolicy = "limit" | "tick";

export interface PositionSnapshot {
  side: Exclude<PositionSide, "flat">;
  quantity: string; // Exact decimal
  entryPrice: number;
  leverage: number;
  liquidationPrice: number;
  pnl: number;
  margin: number;
}

export interface OrderSnapshot {
  id: number;
  side: Side;
  type: OrderType;
  quantity: string; // Exact decimal
  price: number | null;
  createdAt: string;
}

/**
 * Full account state published once per tick. Money fields are rounded to 2 dp.
 */
export interface Snapshot {
  symbol: string;
  timestamp: string;
  price: number;
  balance: number;
  totalValue: number; // balance + position value after closing fee
  leverage: number; // requested leverage; position.leverage is the effective one
  position: PositionSnapshot | null;
  openOrders: OrderSnapshot[];
}
