import { beforeEach, describe, expect, it, vi } from "vitest";
import { FeedClosedError } from "../src/errors.js";
import { ReplayPriceFeed } from "../src/pricing/replay.js";
import { type EngineOptions, FuturesSimulator } from "../src/sim/engine.js";
import { MemoryStateStore } from "../src/store/memory.js";
import type { StateStore } from "../src/store/types.js";
import { Decimal } from "../src/utils/decimal.js";

const d = (value: Decimal.Value) => new Decimal(value);
const NOW = new Date("2024-01-01T00:00:00.000Z");

const OPTIONS: EngineOptions = {
  symbol: "btcusdt",
  balance: 1000,
  feeRate: 0,
  minNotional: 1,
  leverage: 1,
  limitFill: "limit",
  priceDecimals: null,
  tickIntervalMs: 0,
};

function createSimulator(
  overrides: Partial<EngineOptions> = {},
  prices: Decimal.Value[] = []
): { simulator: FuturesSimulator; store: MemoryStateStore; feed: ReplayPriceFeed } {
  const store = new MemoryStateStore();
  const feed = new ReplayPriceFeed(prices.map(d));
  const simulator = new FuturesSimulator({ ...OPTIONS, ...overrides }, feed, store);
  return { simulator, store, feed };
}

describe("FuturesSimulator", () => {
  let simulator: FuturesSimulator;
  let store: MemoryStateStore;

  beforeEach(() => {
    ({ simulator, store } = createSimulator());
  });

  it("should start flat with the configured account", () => {
    expect(simulator.symbol).toBe("BTCUSDT");
    expect(simulator.state).toBe("idle");
    expect(simulator.ticks).toBe(0);
    expect(simulator.getAccount().balance.toString()).toBe("1000");
    expect(simulator.getPosition().isFlat).toBe(true);
    expect(simulator.getOpenOrders()).toEqual([]);
  });

  it("should round the fee rate to four decimals half to even", () => {
    ({ simulator } = createSimulator({ feeRate: 0.00045 }));
    expect(simulator.getAccount().feeRate.toString()).toBe("0.0004");
  });

  it("should publish a snapshot every tick", () => {
    const report = simulator.tick(d(100), NOW);

    expect(report.match).toEqual({ status: "none" });
    expect(report.snapshot).toEqual({
      symbol: "BTCUSDT",
      timestamp: "2024-01-01T00:00:00.000Z",
      price: 100,
      balance: 1000,
      totalValue: 1000,
      leverage: 1,
      position: null,
      openOrders: [],
    });
    expect(store.latest()).toBe(report.snapshot);
    expect(simulator.ticks).toBe(1);
  });

  it("should fill a submitted market order on the next tick", () => {
    store.submitOrder({ side: "buy", quantity: "1" });

    const report = simulator.tick(d(100), NOW);

    expect(report.submitted?.id).toBe(1);
    expect(report.match.status).toBe("filled");
    expect(report.snapshot.balance).toBe(900);
    expect(report.snapshot.totalValue).toBe(1000);
    expect(report.snapshot.position).toEqual({
      side: "long",
      quantity: "1",
      entryPrice: 100,
      leverage: 1,
      liquidationPrice: 0,
      pnl: 0,
      margin: 0,
    });
  });

  it("should realize profit when the position is closed", () => {
    store.submitOrder({ side: "buy", quantity: "1" });
    simulator.tick(d(100), NOW);
    store.submitOrder({ side: "sell", quantity: "1" });

    const report = simulator.tick(d(110), NOW);

    expect(report.snapshot.balance).toBe(1010);
    expect(report.snapshot.totalValue).toBe(1010);
    expect(report.snapshot.position).toBeNull();
  });

  it("should keep only the last order submitted within a tick", () => {
    store.submitOrder({ side: "buy", quantity: "1" });
    store.submitOrder({ side: "buy", quantity: "2" });

    const report = simulator.tick(d(100), NOW);

    expect(report.submitted?.id).toBe(1);
    expect(report.submitted?.quantity.toString()).toBe("2");
    expect(report.snapshot.balance).toBe(800);
  });

  it("should show queued limit orders and cancel them", () => {
    store.submitOrder({ side: "buy", quantity: "1", price: "90" });
    simulator.tick(d(100), NOW);

    expect(store.latest()?.openOrders).toEqual([
      {
        id: 1,
        side: "buy",
        type: "limit",
        quantity: "1",
        price: 90,
        createdAt: "2024-01-01T00:00:00.000Z",
      },
    ]);

    expect(store.cancelOrder(1)).toBe(true);
    expect(store.cancelOrder(1)).toBe(false);
    expect(store.cancelOrder(2)).toBe(false);

    const report = simulator.tick(d(101), NOW);

    expect(report.cancelled).toEqual([1]);
    expect(report.snapshot.openOrders).toEqual([]);
  });

  it("should apply requested leverage to the next opening", () => {
    store.requestLeverage(10);
    store.submitOrder({ side: "buy", quantity: "1" });

    const report = simulator.tick(d(100), NOW);

    expect(report.match.status === "filled" && report.match.leverage).toBe(10);
    expect(report.snapshot.balance).toBe(990);
    expect(report.snapshot.leverage).toBe(10);
    expect(report.snapshot.position?.leverage).toBe(10);
    expect(report.snapshot.position?.liquidationPrice).toBe(90);
  });

  it("should not change the leverage of an open position", () => {
    store.submitOrder({ side: "buy", quantity: "1" });
    simulator.tick(d(100), NOW);
    store.requestLeverage(5);

    const report = simulator.tick(d(100), NOW);

    expect(report.snapshot.leverage).toBe(5);
    expect(report.snapshot.position?.leverage).toBe(1);
    expect(simulator.getPosition().leverage).toBe(1);
  });

  it("should liquidate without crediting the balance", () => {
    store.requestLeverage(10);
    store.submitOrder({ side: "buy", quantity: "1" });
    simulator.tick(d(100), NOW);

    const healthy = simulator.tick(d(95), NOW);
    expect(healthy.liquidation).toBeNull();
    expect(healthy.snapshot.totalValue).toBe(995);
    expect(healthy.snapshot.position?.pnl).toBe(-5);
    expect(healthy.snapshot.position?.margin).toBe(-50);

    const report = simulator.tick(d(90), NOW);

    expect(report.liquidation?.liquidationPrice.toString()).toBe("90");
    expect(report.snapshot.position).toBeNull();
    expect(report.snapshot.balance).toBe(990);
    expect(report.snapshot.totalValue).toBe(990);
  });

  it("should keep ticking when commands cannot be read", () => {
    const failing: StateStore = {
      takeCommands: vi.fn(() => {
        throw new Error("commands unavailable");
      }),
      publish: vi.fn(),
      reset: vi.fn(),
    };
    const sim = new FuturesSimulator(OPTIONS, new ReplayPriceFeed([]), failing);

    const report = sim.tick(d(100), NOW);

    expect(report.match).toEqual({ status: "none" });
    expect(failing.publish).toHaveBeenCalledWith(report.snapshot);
    expect(sim.ticks).toBe(1);
  });

  it("should keep trading when snapshots cannot be published", () => {
    class FailingPublishStore extends MemoryStateStore {
      publish(): void {
        throw new Error("disk full");
      }
    }
    const failing = new FailingPublishStore();
    const sim = new FuturesSimulator(OPTIONS, new ReplayPriceFeed([]), failing);

    failing.submitOrder({ side: "buy", quantity: "1" });
    const opened = sim.tick(d(100), NOW);
    expect(opened.snapshot.balance).toBe(900);

    failing.submitOrder({ side: "sell", quantity: "1" });
    const closed = sim.tick(d(110), NOW);

    expect(closed.snapshot.balance).toBe(1010);
    expect(closed.snapshot.position).toBeNull();
    expect(sim.ticks).toBe(2);
    expect(failing.latest()).toBeNull();
  });

  it("should round feed prices when price decimals are set", async () => {
    const { simulator: sim, feed } = createSimulator({ priceDecimals: 1 }, ["100.25", "100.35"]);
    await feed.connect();

    expect((await sim.step()).price.toString()).toBe("100.2");
    expect((await sim.step()).price.toString()).toBe("100.4");
  });

  it("should skip prices that round to zero", async () => {
    const { simulator: sim, store: memory, feed } = createSimulator({ priceDecimals: 0 }, [3, "0.3", 4]);
    await feed.connect();
    memory.submitOrder({ side: "buy", quantity: "1" });

    expect((await sim.step()).price.toString()).toBe("3");
    const report = await sim.step();

    expect(report.price.toString()).toBe("4");
    expect(report.snapshot.position?.side).toBe("long");
    expect(sim.ticks).toBe(2);
  });

  it("should run until the replay is exhausted", async () => {
    const { simulator: sim, store: memory, feed } = createSimulator({}, [100, 110, 120]);
    await feed.connect();

    await expect(sim.run()).rejects.toBeInstanceOf(FeedClosedError);

    expect(sim.ticks).toBe(3);
    expect(sim.isRunning).toBe(false);
    expect(memory.latest()?.price).toBe(120);
  });

  it("should refuse to run twice at once", async () => {
    const { simulator: sim, feed } = createSimulator({}, [100]);
    await feed.connect();

    const first = expect(sim.run()).rejects.toBeInstanceOf(FeedClosedError);
    await expect(sim.run()).rejects.toThrow("Simulator is already running");
    await first;
  });
});
