import type { PositionSide } from "../types.js";
import { type Decimal, formatPrice } from "../utils/decimal.js";
import { logger } from "../utils/logger.js";
import type { Position } from "./position.js";

export interface LiquidationEvent {
  side: Exclude<PositionSide, "flat">;
  quantity: Decimal;
  entryPrice: Decimal;
  leverage: number;
  liquidationPrice: Decimal;
  price: Decimal;
}

export function isLiquidated(position: Position, price: Decimal, feeRate: Decimal): boolean {
  if (position.isFlat) return false;
  const liquidationPrice = position.liquidationPrice(feeRate);
  return position.side === "long" ? price.lte(liquidationPrice) : price.gte(liquidationPrice);
}

/**
 * Force-close the whole position at the tick price once it crosses the
 * liquidation price. Whatever the close would return is forfeited: the
 * balance is not credited.
 */
export function checkLiquidation(
  position: Position,
  price: Decimal,
  feeRate: Decimal
): LiquidationEvent | null {
  if (position.isFlat || !isLiquidated(position, price, feeRate)) {
    return null;
  }

  const event: LiquidationEvent = {
    side: position.side === "long" ? "long" : "short",
    quantity: position.quantity,
    entryPrice: position.entryPrice,
    leverage: position.leverage,
    liquidationPrice: position.liquidationPrice(feeRate),
    price,
  };

  position.decrease(position.quantity, price);

  logger.warn(
    `${formatPrice(price)} - Position liquidated: ${event.side} ${event.quantity} @ ${formatPrice(event.entryPrice)} (liq ${formatPrice(event.liquidationPrice)}, ${event.leverage}x)`
  );
  return event;
}
