import { describe, expect, it } from "vitest";
import { Position, sideSign } from "../src/sim/position.js";
import { Decimal } from "../src/utils/decimal.js";

const d = (value: Decimal.Value) => new Decimal(value);

function openPosition(
  side: "long" | "short",
  quantity: Decimal.Value,
  price: Decimal.Value,
  leverage = 1
): Position {
  const position = new Position(leverage);
  position.open(side);
  position.increase(d(quantity), d(price));
  return position;
}

describe("Position", () => {
  it("should start flat with the given leverage", () => {
    const position = new Position(5);
    expect(position.side).toBe("flat");
    expect(position.isFlat).toBe(true);
    expect(position.quantity.isZero()).toBe(true);
    expect(position.entryPrice.isZero()).toBe(true);
    expect(position.leverage).toBe(5);
    expect(position.toString()).toBe("No position");
  });

  it("should reject leverage that is not a positive integer", () => {
    expect(() => new Position(0)).toThrow("Leverage must be an integer >= 1");
    expect(() => new Position(1.5)).toThrow();
    expect(() => new Position().setLeverage(-2)).toThrow();
  });

  it("should only change leverage while flat", () => {
    const position = new Position(1);
    expect(position.setLeverage(10)).toBe(10);

    position.open("long");
    position.increase(d(1), d(100));
    expect(position.setLeverage(20)).toBe(10);
    expect(position.leverage).toBe(10);
  });

  it("should keep leverage after the position is closed", () => {
    const position = openPosition("long", 1, 100, 4);
    position.decrease(d(1), d(100));
    expect(position.isFlat).toBe(true);
    expect(position.leverage).toBe(4);
  });

  it("should average the entry price by quantity", () => {
    const position = openPosition("long", 1, 100);
    position.increase(d(1), d(110));
    expect(position.quantity.toString()).toBe("2");
    expect(position.entryPrice.toString()).toBe("105");

    position.increase(d(2), d(90));
    expect(position.entryPrice.toString()).toBe("97.5");
  });

  it("should refuse to open the opposite side of an open position", () => {
    const position = openPosition("long", 1, 100);
    expect(() => position.open("short")).toThrow("Cannot open short: position is already long");
    expect(() => position.open("long")).not.toThrow();
  });

  it("should refuse to increase a flat position", () => {
    expect(() => new Position().increase(d(1), d(100))).toThrow(
      "Position side must be opened before increasing"
    );
  });

  it("should reject non-positive increase quantity and price", () => {
    const position = openPosition("long", 1, 100);
    expect(() => position.increase(d(0), d(100))).toThrow();
    expect(() => position.increase(d(1), d(-5))).toThrow();
  });

  it("should realize pnl on a partial decrease and keep the entry price", () => {
    const position = openPosition("long", 2, 105);
    const result = position.decrease(d(1), d(120));

    expect(result.initial.toString()).toBe("105");
    expect(result.pnl.toString()).toBe("15");
    expect(position.side).toBe("long");
    expect(position.quantity.toString()).toBe("1");
    expect(position.entryPrice.toString()).toBe("105");
  });

  it("should go flat when fully decreased", () => {
    const position = openPosition("short", 2, 100);
    const result = position.decrease(d(2), d(90));

    expect(result.pnl.toString()).toBe("20");
    expect(position.side).toBe("flat");
    expect(position.quantity.isZero()).toBe(true);
    expect(position.entryPrice.isZero()).toBe(true);
  });

  it("should reject a decrease larger than the position", () => {
    const position = openPosition("long", 1, 100);
    expect(() => position.decrease(d(2), d(100))).toThrow();
    expect(() => position.decrease(d(0), d(100))).toThrow();
  });

  it("should compute pnl for both sides", () => {
    expect(openPosition("long", 2, 100).pnl(d(90)).toString()).toBe("-20");
    expect(openPosition("short", 2, 100).pnl(d(90)).toString()).toBe("20");
    expect(new Position().pnl(d(90)).isZero()).toBe(true);
  });

  it("should put the liquidation price one leverage step from entry without fees", () => {
    expect(openPosition("long", 1, 100, 10).liquidationPrice(d(0)).toString()).toBe("90");
    expect(openPosition("short", 1, 100, 10).liquidationPrice(d(0)).toString()).toBe("110");
  });

  it("should move the liquidation price towards entry by the closing fee", () => {
    const long = openPosition("long", 1, 100, 10);
    expect(long.liquidationPrice(d("0.0004")).toString()).toBe("90.036");

    const short = openPosition("short", 1, 100, 10);
    expect(short.liquidationPrice(d("0.0004")).toString()).toBe("109.956");
  });

  it("should report a full margin loss at the fee-free liquidation price", () => {
    const long = openPosition("long", 1, 100, 10);
    expect(long.margin(d(90)).toString()).toBe("-100");

    const short = openPosition("short", 1, 100, 10);
    expect(short.margin(d(110)).toString()).toBe("-100");

    const third = openPosition("long", 1, 100, 3);
    expect(third.margin(third.liquidationPrice(d(0))).toDecimalPlaces(8).toNumber()).toBe(-100);
  });

  it("should report margin short of -100 at the fee-adjusted liquidation price", () => {
    const long = openPosition("long", 1, 100, 10);
    const liquidationPrice = long.liquidationPrice(d("0.0004"));
    expect(long.margin(liquidationPrice).toString()).toBe("-99.64");
  });

  it("should value the position net of the closing fee", () => {
    const position = openPosition("long", 1, 100);
    expect(position.value(d(110), d(0)).toString()).toBe("110");
    expect(position.value(d(110), d("0.001")).toString()).toBe("109.89");

    const leveraged = openPosition("long", 1, 100, 10);
    expect(leveraged.value(d(95), d(0)).toString()).toBe("5");
  });

  it("should describe itself", () => {
    expect(openPosition("long", 1, 100).toString()).toBe("Long 1 @ 100.00$");
    expect(openPosition("short", "0.5", "43250.126").toString()).toBe("Short 0.5 @ 43250.13$");
  });

  it("should map sides to signs", () => {
    expect(sideSign("long")).toBe(1);
    expect(sideSign("short")).toBe(-1);
    expect(sideSign("flat")).toBe(0);
  });
});
