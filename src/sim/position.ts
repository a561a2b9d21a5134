import type { PositionSide } from "../types.js";
import { Decimal, ZERO } from "../utils/decimal.js";

export interface DecreaseResult {
  /** Notional released at entry price (quantity * entryPrice) */
  initial: Decimal;
  /** Realized profit or loss on the closed quantity */
  pnl: Decimal;
}

export function sideSign(side: PositionSide): number {
  if (side === "long") return 1;
  if (side === "short") return -1;
  return 0;
}

function assertLeverage(leverage: number): void {
  if (!Number.isInteger(leverage) || leverage < 1) {
    throw new Error(`Leverage must be an integer >= 1, got ${leverage}`);
  }
}

/**
 * The single margin position of the account.
 *
 * Invariant: quantity is zero iff side is "flat" iff entryPrice is zero.
 * Leverage can only change while flat and survives closing the position.
 */
export class Position {
  private _side: PositionSide = "flat";
  private _quantity: Decimal = ZERO;
  private _entryPrice: Decimal = ZERO;
  private _leverage: number;

  constructor(leverage = 1) {
    assertLeverage(leverage);
    this._leverage = leverage;
  }

  get side(): PositionSide {
    return this._side;
  }

  get quantity(): Decimal {
    return this._quantity;
  }

  get entryPrice(): Decimal {
    return this._entryPrice;
  }

  get leverage(): number {
    return this._leverage;
  }

  get isFlat(): boolean {
    return this._side === "flat";
  }

  /**
   * Set leverage if there is no open position.
   * Returns the leverage in effect, which is unchanged while a position is open.
   */
  setLeverage(leverage: number): number {
    assertLeverage(leverage);
    if (this.isFlat) {
      this._leverage = leverage;
    }
    return this._leverage;
  }

  /**
   * Choose the direction of a flat position ahead of the first increase
   */
  open(side: Exclude<PositionSide, "flat">): void {
    if (!this.isFlat && this._side !== side) {
      throw new Error(`Cannot open ${side}: position is already ${this._side}`);
    }
    this._side = side;
  }

  /**
   * Add to the position at the given price, re-weighting the entry price
   */
  increase(quantity: Decimal, price: Decimal): void {
    if (!quantity.gt(0)) throw new Error(`Increase quantity must be positive, got ${quantity}`);
    if (!price.gt(0)) throw new Error(`Increase price must be positive, got ${price}`);
    if (this.isFlat) throw new Error("Position side must be opened before increasing");

    const newQuantity = this._quantity.plus(quantity);
    this._entryPrice = this._quantity
      .times(this._entryPrice)
      .plus(quantity.times(price))
      .div(newQuantity);
    this._quantity = newQuantity;
  }

  /**
   * Close part or all of the position at the given price.
   * The caller credits initial / leverage + pnl - fee to the balance.
   */
  decrease(quantity: Decimal, price: Decimal): DecreaseResult {
    if (!quantity.gt(0) || quantity.gt(this._quantity)) {
      throw new Error(`Decrease quantity must be in (0, ${this._quantity}], got ${quantity}`);
    }
    if (!price.gt(0)) throw new Error(`Decrease price must be positive, got ${price}`);

    const initial = quantity.times(this._entryPrice);
    const pnl = quantity.times(price.minus(this._entryPrice)).times(sideSign(this._side));

    this._quantity = this._quantity.minus(quantity);
    if (this._quantity.isZero()) {
      this._side = "flat";
      this._entryPrice = ZERO;
    }
    return { initial, pnl };
  }

  /** Unrealized profit or loss at the given price */
  pnl(price: Decimal): Decimal {
    if (this.isFlat) return ZERO;
    return this._quantity.times(price.minus(this._entryPrice)).times(sideSign(this._side));
  }

  /**
   * Unrealized PnL as a percentage of posted margin; -100 is a full margin loss
   */
  margin(price: Decimal): Decimal {
    if (this.isFlat) return ZERO;
    const posted = this._quantity.times(this._entryPrice).div(this._leverage);
    return this.pnl(price).times(100).div(posted);
  }

  /** Posted margin plus unrealized PnL, less the fee for closing at `price` */
  value(price: Decimal, feeRate: Decimal): Decimal {
    const pnl = this.pnl(price);
    const notional = this._quantity.times(this._entryPrice);
    const fee = notional.plus(pnl).times(feeRate);
    return notional.div(this._leverage).plus(pnl).minus(fee);
  }

  /**
   * Price at which the posted margin is used up, brought closer to entry
   * by the fee for closing there
   */
  liquidationPrice(feeRate: Decimal): Decimal {
    const sign = sideSign(this._side);
    const base = this._entryPrice.minus(this._entryPrice.div(this._leverage).times(sign));
    const fee = base.times(this._quantity).times(feeRate);
    return base.plus(fee.times(sign));
  }

  toString(): string {
    if (this.isFlat) return "No position";
    const side = this._side === "long" ? "Long" : "Short";
    return `${side} ${this._quantity.toDecimalPlaces(8).toString()} @ ${this._entryPrice.toFixed(2)}$`;
  }
}
