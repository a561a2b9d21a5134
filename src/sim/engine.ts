import { setTimeout as sleep } from "node:timers/promises";
import { FeedClosedError, describeError } from "../errors.js";
import type { PriceFeed } from "../pricing/types.js";
import type { PendingCommands, StateStore } from "../store/types.js";
import { emptyCommands } from "../store/types.js";
import type { Account, Order, Snapshot } from "../types.js";
import { Decimal, formatPrice, round2 } from "../utils/decimal.js";
import { logger } from "../utils/logger.js";
import type { SimulatorConfig } from "./config.js";
import { type LiquidationEvent, checkLiquidation } from "./liquidation.js";
import { type MatchResult, matchOrders } from "./matching.js";
import { OrderQueue } from "./orders.js";
import { Position } from "./position.js";
import { buildSnapshot } from "./snapshot.js";

export type EngineOptions = Pick<
  SimulatorConfig,
  | "symbol"
  | "balance"
  | "feeRate"
  | "minNotional"
  | "leverage"
  | "limitFill"
  | "priceDecimals"
  | "tickIntervalMs"
>;

export type EngineState = "idle" | "processing";

/**
 * What happened during one tick
 */
export interface TickReport {
  price: Decimal;
  submitted: Order | null;
  cancelled: number[];
  liquidation: LiquidationEvent | null;
  match: MatchResult;
  snapshot: Snapshot;
}

/**
 * Single-symbol futures account driven by a price feed.
 *
 * Each tick: take commands, check liquidation, match one order, publish a
 * snapshot. Awaiting the next price is the only suspension point; everything
 * else in a tick runs synchronously, so the account, position and queue are
 * never seen half-updated.
 */
export class FuturesSimulator {
  readonly symbol: string;
  private readonly account: Account;
  private readonly position: Position;
  private readonly queue = new OrderQueue();
  private requestedLeverage: number;
  private _state: EngineState = "idle";
  private running = false;
  private tickCount = 0;

  constructor(
    private readonly options: EngineOptions,
    private readonly feed: PriceFeed,
    private readonly store: StateStore
  ) {
    this.symbol = options.symbol.toUpperCase();
    this.account = {
      balance: new Decimal(options.balance),
      feeRate: new Decimal(String(options.feeRate)).toDecimalPlaces(4, Decimal.ROUND_HALF_EVEN),
      minNotional: new Decimal(String(options.minNotional)),
    };
    this.position = new Position(options.leverage);
    this.requestedLeverage = options.leverage;
  }

  get state(): EngineState {
    return this._state;
  }

  get ticks(): number {
    return this.tickCount;
  }

  /** Read-only views for reporting and tests */
  getAccount(): Readonly<Account> {
    return { ...this.account };
  }

  getPosition(): Position {
    return this.position;
  }

  getOpenOrders(): readonly Order[] {
    return this.queue.list();
  }

  private takeCommands(): PendingCommands {
    try {
      return this.store.takeCommands();
    } catch (error) {
      logger.error(`Failed to read pending commands: ${describeError(error)}`);
      return emptyCommands();
    }
  }

  private ingest(price: Decimal, commands: PendingCommands, now: Date): Order | null {
    const priceStr = formatPrice(price);

    if (commands.leverage !== null && commands.leverage !== this.requestedLeverage) {
      this.requestedLeverage = commands.leverage;
      logger.info(`${priceStr} - Leverage set to ${commands.leverage}x`);
    }

    for (const id of commands.cancellations) {
      if (this.queue.cancel(id)) {
        logger.info(`${priceStr} - Order ${id} cancelled`);
      } else {
        logger.warn(`${priceStr} - Order ${id} not cancelled: not open`);
      }
    }

    if (!commands.order) return null;
    const order = this.queue.submit(commands.order, now.getTime());
    const limit = order.limitPrice ? ` limit ${order.limitPrice}` : " market";
    logger.info(
      `${priceStr} - Order ${order.id} submitted: ${order.side.toUpperCase()} ${order.quantity}${limit}`
    );
    return order;
  }

  /**
   * Run one tick at the given price: ingest, liquidate, match, publish
   */
  tick(price: Decimal, now: Date = new Date()): TickReport {
    this._state = "processing";
    try {
      const commands = this.takeCommands();
      const submitted = this.ingest(price, commands, now);

      const liquidation = checkLiquidation(this.position, price, this.account.feeRate);

      // Effective only while flat; an open position keeps its leverage
      this.position.setLeverage(this.requestedLeverage);
      const match = matchOrders(
        {
          account: this.account,
          position: this.position,
          queue: this.queue,
          limitFill: this.options.limitFill,
        },
        price
      );

      const snapshot = this.snapshot(price, now);
      try {
        this.store.publish(snapshot);
      } catch (error) {
        logger.error(`Failed to publish snapshot: ${describeError(error)}`);
      }

      this.tickCount += 1;
      this.logTick(price);
      return {
        price,
        submitted,
        cancelled: commands.cancellations,
        liquidation,
        match,
        snapshot,
      };
    } finally {
      this._state = "idle";
    }
  }

  private logTick(price: Decimal): void {
    const priceStr = formatPrice(price);
    if (this.position.isFlat) {
      logger.debug(priceStr);
      return;
    }
    const feeRate = this.account.feeRate;
    const liq = formatPrice(this.position.liquidationPrice(feeRate));
    const pnl = formatPrice(this.position.pnl(price));
    const margin = round2(this.position.margin(price));
    logger.info(
      `${priceStr} - Position: ${this.position} lev:${this.position.leverage}X liq:${liq}$ pnl:${pnl}$ margin:${margin}`
    );
  }

  snapshot(price: Decimal, now: Date = new Date()): Snapshot {
    return buildSnapshot({
      symbol: this.symbol,
      price,
      account: this.account,
      position: this.position,
      orders: this.queue.list(),
      requestedLeverage: this.requestedLeverage,
      now,
    });
  }

  /**
   * Wait for the next price and run a tick with it. Prices that round to zero
   * are skipped.
   */
  async step(): Promise<TickReport> {
    const decimals = this.options.priceDecimals;
    while (true) {
      const raw = await this.feed.nextPrice();
      const price = decimals === null ? raw : raw.toDecimalPlaces(decimals, Decimal.ROUND_HALF_EVEN);
      if (price.gt(0)) {
        return this.tick(price);
      }
      logger.warn(`Skipping price ${raw.toString()}: rounds to ${price.toString()} at ${decimals} decimals`);
    }
  }

  /**
   * Tick until stop() is called or the feed closes.
   * A feed that closes while running is fatal and rejects.
   */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error("Simulator is already running");
    }
    this.running = true;
    this.store.reset();
    logger.info(`Simulator started for ${this.symbol}`);

    try {
      while (this.running) {
        await this.step();
        if (this.running && this.options.tickIntervalMs > 0) {
          await sleep(this.options.tickIntervalMs);
        }
      }
    } catch (error) {
      if (error instanceof FeedClosedError && !this.running) {
        logger.info("Price feed closed, simulator stopped");
        return;
      }
      throw error;
    } finally {
      this.running = false;
    }
    logger.info(`Simulator stopped after ${this.tickCount} ticks`);
  }

  /** Ask the loop to stop after the current tick */
  stop(): void {
    this.running = false;
  }

  get isRunning(): boolean {
    return this.running;
  }
}
