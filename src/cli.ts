#!/usr/bin/env node
import { parseArgs } from "node:util";
import { FeedClosedError } from "./errors.js";
import { createPriceFeed } from "./pricing/index.js";
import {
  type SimulatorConfig,
  isLimitFillPolicy,
  isPriceSource,
  mergeConfig,
  validateConfig,
} from "./sim/config.js";
import { FuturesSimulator } from "./sim/engine.js";
import { JsonFileStateStore } from "./store/json-file.js";
import { logger } from "./utils/logger.js";

const USAGE = `Usage: futures-sim -s <symbol> -b <balance> -f <fee-rate> [options]

Options:
  -s, --symbol <symbol>        Futures symbol, e.g. BTCUSDT
  -b, --balance <amount>       Starting balance (integer, quote asset)
  -f, --fee <rate>             Fee rate per fill, e.g. 0.0004
      --min-notional <amount>  Minimum order value (default 1)
      --leverage <n>           Starting leverage (default 1)
      --source <binance|replay>
      --replay <file>          Price file for the replay source
      --state-dir <dir>        Directory for state.json and commands/
      --interval <ms>          Pause between ticks (default 1000)
      --price-decimals <n>     Round each tick to n decimals
      --limit-fill <limit|tick>
      --reconnect              Reconnect when the Binance connection drops
  -h, --help`;

function parseNumberFlag(flag: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new Error(`--${flag} must be a number, got "${value}"`);
  }
  return parsed;
}

function parseCliArgs(argv: string[]): Partial<SimulatorConfig> | null {
  const { values } = parseArgs({
    args: argv,
    options: {
      symbol: { type: "string", short: "s" },
      balance: { type: "string", short: "b" },
      fee: { type: "string", short: "f" },
      "min-notional": { type: "string" },
      leverage: { type: "string" },
      source: { type: "string" },
      replay: { type: "string" },
      "state-dir": { type: "string" },
      interval: { type: "string" },
      "price-decimals": { type: "string" },
      "limit-fill": { type: "string" },
      reconnect: { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) return null;

  const overrides: Partial<SimulatorConfig> = {};
  if (values.symbol !== undefined) overrides.symbol = values.symbol;
  if (values.balance !== undefined) overrides.balance = parseNumberFlag("balance", values.balance);
  if (values.fee !== undefined) overrides.feeRate = parseNumberFlag("fee", values.fee);
  if (values["min-notional"] !== undefined) {
    overrides.minNotional = parseNumberFlag("min-notional", values["min-notional"]);
  }
  if (values.leverage !== undefined) {
    overrides.leverage = parseNumberFlag("leverage", values.leverage);
  }
  if (values.source !== undefined) {
    if (!isPriceSource(values.source)) {
      throw new Error(`--source must be "binance" or "replay", got "${values.source}"`);
    }
    overrides.priceSource = values.source;
  }
  if (values.replay !== undefined) {
    overrides.replayFile = values.replay;
    if (overrides.priceSource === undefined) overrides.priceSource = "replay";
  }
  if (values["state-dir"] !== undefined) overrides.stateDir = values["state-dir"];
  if (values.interval !== undefined) {
    overrides.tickIntervalMs = parseNumberFlag("interval", values.interval);
  }
  if (values["price-decimals"] !== undefined) {
    overrides.priceDecimals = parseNumberFlag("price-decimals", values["price-decimals"]);
  }
  if (values["limit-fill"] !== undefined) {
    if (!isLimitFillPolicy(values["limit-fill"])) {
      throw new Error(`--limit-fill must be "limit" or "tick", got "${values["limit-fill"]}"`);
    }
    overrides.limitFill = values["limit-fill"];
  }
  if (values.reconnect !== undefined) overrides.reconnect = values.reconnect;
  return overrides;
}

async function main(): Promise<void> {
  const overrides = parseCliArgs(process.argv.slice(2));
  if (!overrides) {
    console.log(USAGE);
    return;
  }

  const config = mergeConfig(overrides);
  validateConfig(config);

  const feed = createPriceFeed(config);
  const store = new JsonFileStateStore(config.stateDir, config.maxLeverage);
  const simulator = new FuturesSimulator(config, feed, store);

  const shutdown = (): void => {
    logger.info("Shutting down...");
    simulator.stop();
    feed.close();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  try {
    await feed.connect();
    logger.info(`State directory: ${store.dir}`);
    await simulator.run();
  } catch (error) {
    if (error instanceof FeedClosedError && config.priceSource === "replay") {
      logger.info(`Replay finished after ${simulator.ticks} ticks`);
      return;
    }
    throw error;
  } finally {
    feed.close();
  }
}

main().catch((error: unknown) => {
  logger.error("Simulator stopped:", error);
  process.exitCode = 1;
});
