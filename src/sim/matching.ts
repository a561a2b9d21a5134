import type { Account, LimitFillPolicy, Order } from "../types.js";
import { type Decimal, formatPrice } from "../utils/decimal.js";
import { logger } from "../utils/logger.js";
import type { OrderQueue } from "./orders.js";
import type { Position } from "./position.js";

export type FillAction = "open" | "increase" | "reduce" | "close" | "reverse";
export type RejectReason = "min-notional" | "insufficient-balance";

export type MatchResult =
  | { status: "none" }
  | { status: "filled"; order: Order; price: Decimal; action: FillAction; leverage: number }
  | { status: "rejected"; order: Order; price: Decimal; reason: RejectReason };

export interface MatchContext {
  account: Account;
  position: Position;
  queue: OrderQueue;
  limitFill: LimitFillPolicy;
}

const log = logger.child("matching");

/**
 * Price an eligible order fills at for the given tick
 */
export function executionPrice(order: Order, tickPrice: Decimal, policy: LimitFillPolicy): Decimal {
  if (order.limitPrice && policy === "limit") {
    return order.limitPrice;
  }
  return tickPrice;
}

/** Margin plus opening fee for a new or increased position */
export function openingCost(
  quantity: Decimal,
  price: Decimal,
  leverage: number,
  feeRate: Decimal
): Decimal {
  const notional = quantity.times(price);
  return notional.div(leverage).plus(notional.times(feeRate));
}

/**
 * Decrease the position and credit the released margin, PnL and closing fee
 */
function settleDecrease(
  account: Account,
  position: Position,
  quantity: Decimal,
  price: Decimal,
  leverage: number
): void {
  const { initial, pnl } = position.decrease(quantity, price);
  const fee = initial.plus(pnl).times(account.feeRate);
  account.balance = account.balance.plus(initial.div(leverage)).plus(pnl).minus(fee);
}

function reject(
  queue: OrderQueue,
  order: Order,
  price: Decimal,
  reason: RejectReason
): MatchResult {
  queue.remove(order.id);
  const detail =
    reason === "min-notional" ? "value below minimum notional" : "not enough balance";
  log.warn(`${formatPrice(price)} - Order ${order.id} not processed: ${detail}`);
  return { status: "rejected", order, price, reason };
}

function fill(
  queue: OrderQueue,
  order: Order,
  price: Decimal,
  action: FillAction,
  leverage: number
): MatchResult {
  queue.remove(order.id);
  log.info(
    `${formatPrice(price)} - Order ${order.id} processed (${action}): ${order.side.toUpperCase()} ${order.quantity} @ ${formatPrice(price)}`
  );
  return { status: "filled", order, price, action, leverage };
}

/**
 * Match the first eligible queued order against the tick price.
 *
 * At most one order is filled or rejected per call; everything else stays
 * queued for the next tick.
 */
export function matchOrders(context: MatchContext, tickPrice: Decimal): MatchResult {
  const { account, position, queue } = context;
  const [order] = queue.eligible(tickPrice);
  if (!order) {
    return { status: "none" };
  }

  const price = executionPrice(order, tickPrice, context.limitFill);
  const leverage = position.leverage;
  const { feeRate } = account;

  if (order.quantity.times(price).div(leverage).lt(account.minNotional)) {
    return reject(queue, order, price, "min-notional");
  }

  const direction = order.side === "buy" ? "long" : "short";

  if (position.isFlat || position.side === direction) {
    const cost = openingCost(order.quantity, price, leverage, feeRate);
    if (account.balance.lt(cost)) {
      return reject(queue, order, price, "insufficient-balance");
    }
    const action: FillAction = position.isFlat ? "open" : "increase";
    account.balance = account.balance.minus(cost);
    position.open(direction);
    position.increase(order.quantity, price);
    return fill(queue, order, price, action, leverage);
  }

  if (order.quantity.lte(position.quantity)) {
    settleDecrease(account, position, order.quantity, price, leverage);
    return fill(queue, order, price, position.isFlat ? "close" : "reduce", leverage);
  }

  // Close everything, then open the other side with what is left of the order.
  // Proceeds of the close count towards the cost of the new side.
  const remaining = order.quantity.minus(position.quantity);
  const cost = openingCost(remaining, price, leverage, feeRate);
  const available = account.balance.plus(position.value(price, feeRate));
  if (available.lt(cost)) {
    return reject(queue, order, price, "insufficient-balance");
  }

  settleDecrease(account, position, position.quantity, price, leverage);
  account.balance = account.balance.minus(cost);
  position.open(direction);
  position.increase(remaining, price);
  return fill(queue, order, price, "reverse", leverage);
}
