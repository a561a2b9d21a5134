import { describe, expect, it } from "vitest";
import { checkLiquidation, isLiquidated } from "../src/sim/liquidation.js";
import { Position } from "../src/sim/position.js";
import { Decimal } from "../src/utils/decimal.js";

const d = (value: Decimal.Value) => new Decimal(value);

function openPosition(side: "long" | "short", leverage: number): Position {
  const position = new Position(leverage);
  position.open(side);
  position.increase(d(1), d(100));
  return position;
}

describe("isLiquidated", () => {
  it("should trigger a long at or below the liquidation price", () => {
    const position = openPosition("long", 10);
    expect(isLiquidated(position, d("90.01"), d(0))).toBe(false);
    expect(isLiquidated(position, d(90), d(0))).toBe(true);
    expect(isLiquidated(position, d(80), d(0))).toBe(true);
  });

  it("should trigger a short at or above the liquidation price", () => {
    const position = openPosition("short", 10);
    expect(isLiquidated(position, d("109.99"), d(0))).toBe(false);
    expect(isLiquidated(position, d(110), d(0))).toBe(true);
  });

  it("should trigger earlier once fees are counted", () => {
    const position = openPosition("long", 10);
    expect(isLiquidated(position, d("90.03"), d(0))).toBe(false);
    expect(isLiquidated(position, d("90.03"), d("0.0004"))).toBe(true);
  });

  it("should never trigger a flat position", () => {
    expect(isLiquidated(new Position(10), d(1), d(0))).toBe(false);
  });
});

describe("checkLiquidation", () => {
  it("should leave a healthy position alone", () => {
    const position = openPosition("long", 10);
    expect(checkLiquidation(position, d(95), d(0))).toBeNull();
    expect(position.quantity.toString()).toBe("1");
  });

  it("should close the whole position and report it", () => {
    const position = openPosition("long", 10);

    const event = checkLiquidation(position, d(89), d(0));

    expect(event).not.toBeNull();
    expect(event?.side).toBe("long");
    expect(event?.quantity.toString()).toBe("1");
    expect(event?.entryPrice.toString()).toBe("100");
    expect(event?.leverage).toBe(10);
    expect(event?.liquidationPrice.toString()).toBe("90");
    expect(event?.price.toString()).toBe("89");
    expect(position.isFlat).toBe(true);
    expect(position.leverage).toBe(10);
  });

  it("should liquidate a short", () => {
    const position = openPosition("short", 5);

    const event = checkLiquidation(position, d(120), d(0));

    expect(event?.side).toBe("short");
    expect(event?.liquidationPrice.toString()).toBe("120");
    expect(position.isFlat).toBe(true);
  });
});
