import { BINANCE_FUTURES_WS_URL } from "../pricing/binance.js";
import type { PriceSource } from "../pricing/types.js";
import { MAX_LEVERAGE } from "../store/validation.js";
import type { LimitFillPolicy } from "../types.js";
import { logger } from "../utils/logger.js";

/**
 * Simulator configuration
 */
export interface SimulatorConfig {
  // Account
  /** Futures symbol, e.g. "BTCUSDT" */
  symbol: string;
  /** Starting balance in quote asset (whole units) */
  balance: number;
  /** Fee charged on every fill as a fraction of notional, e.g. 0.0004 */
  feeRate: number;
  /** Orders worth less than this (quantity * price / leverage) are rejected (default: 1) */
  minNotional: number;

  // Leverage
  /** Leverage requested at startup (default: 1) */
  leverage: number;
  /** Highest leverage a client may request (default: 125) */
  maxLeverage: number;

  // Price feed
  /** "binance" for the live mini ticker, "replay" to play back a file (default: binance) */
  priceSource: PriceSource;
  /** Price file for the replay source */
  replayFile?: string;
  /** Binance futures WebSocket endpoint */
  wsUrl: string;
  /** Reconnect after losing the Binance connection instead of stopping (default: false) */
  reconnect: boolean;
  /** Round each tick to this many decimals; null keeps the feed's precision (default: null) */
  priceDecimals: number | null;

  // Engine
  /** Pause between ticks in ms (default: 1000) */
  tickIntervalMs: number;
  /** Limit order fill price once the tick crosses the limit (default: limit) */
  limitFill: LimitFillPolicy;
  /** Directory for state.json and commands/ (default: .futures-sim) */
  stateDir: string;
}

type RequiredFields = "symbol" | "balance" | "feeRate";

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Omit<SimulatorConfig, RequiredFields> = {
  minNotional: 1,

  leverage: 1,
  maxLeverage: MAX_LEVERAGE,

  priceSource: "binance",
  wsUrl: BINANCE_FUTURES_WS_URL,
  reconnect: false,
  priceDecimals: null,

  tickIntervalMs: 1000,
  limitFill: "limit",
  stateDir: ".futures-sim",
};

export function isPriceSource(value: string): value is PriceSource {
  return value === "binance" || value === "replay";
}

export function isLimitFillPolicy(value: string): value is LimitFillPolicy {
  return value === "limit" || value === "tick";
}

function parseNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new Error(`${name} must be a number, got "${value}"`);
  }
  return parsed;
}

/**
 * Load configuration from environment variables
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<SimulatorConfig> {
  const config: Partial<SimulatorConfig> = {};

  // Account
  if (env.SIM_SYMBOL) {
    config.symbol = env.SIM_SYMBOL;
  }
  if (env.SIM_BALANCE) {
    config.balance = parseNumber("SIM_BALANCE", env.SIM_BALANCE);
  }
  if (env.SIM_FEE_RATE) {
    config.feeRate = parseNumber("SIM_FEE_RATE", env.SIM_FEE_RATE);
  }
  if (env.MIN_NOTIONAL) {
    config.minNotional = parseNumber("MIN_NOTIONAL", env.MIN_NOTIONAL);
  }

  // Leverage
  if (env.SIM_LEVERAGE) {
    config.leverage = parseNumber("SIM_LEVERAGE", env.SIM_LEVERAGE);
  }
  if (env.MAX_LEVERAGE) {
    config.maxLeverage = parseNumber("MAX_LEVERAGE", env.MAX_LEVERAGE);
  }

  // Price feed
  if (env.PRICE_SOURCE) {
    if (!isPriceSource(env.PRICE_SOURCE)) {
      throw new Error(`PRICE_SOURCE must be "binance" or "replay", got "${env.PRICE_SOURCE}"`);
    }
    config.priceSource = env.PRICE_SOURCE;
  }
  if (env.REPLAY_FILE) {
    config.replayFile = env.REPLAY_FILE;
  }
  if (env.BINANCE_WS_URL) {
    config.wsUrl = env.BINANCE_WS_URL;
  }
  if (env.FEED_RECONNECT) {
    config.reconnect = env.FEED_RECONNECT === "true";
  }
  if (env.PRICE_DECIMALS) {
    config.priceDecimals = parseNumber("PRICE_DECIMALS", env.PRICE_DECIMALS);
  }

  // Engine
  if (env.TICK_INTERVAL_MS) {
    config.tickIntervalMs = parseNumber("TICK_INTERVAL_MS", env.TICK_INTERVAL_MS);
  }
  if (env.LIMIT_FILL) {
    if (!isLimitFillPolicy(env.LIMIT_FILL)) {
      throw new Error(`LIMIT_FILL must be "limit" or "tick", got "${env.LIMIT_FILL}"`);
    }
    config.limitFill = env.LIMIT_FILL;
  }
  if (env.STATE_DIR) {
    config.stateDir = env.STATE_DIR;
  }

  return config;
}

/**
 * Merge configurations: defaults, then environment, then explicit overrides
 */
export function mergeConfig(
  overrides?: Partial<SimulatorConfig>,
  env: NodeJS.ProcessEnv = process.env
): SimulatorConfig {
  const merged = {
    ...DEFAULT_CONFIG,
    ...loadConfigFromEnv(env),
    ...overrides,
  };

  const { symbol, balance, feeRate } = merged;
  if (symbol === undefined) {
    throw new Error("Symbol is required");
  }
  if (balance === undefined) {
    throw new Error("Starting balance is required");
  }
  if (feeRate === undefined) {
    throw new Error("Fee rate is required");
  }

  const config: SimulatorConfig = { ...merged, symbol, balance, feeRate };
  logger.info("Simulator configuration:", config);
  return config;
}

/**
 * Validate configuration
 */
export function validateConfig(config: SimulatorConfig): void {
  if (!config.symbol.trim()) {
    throw new Error("Symbol is required");
  }
  if (!Number.isInteger(config.balance) || config.balance <= 0) {
    throw new Error("Starting balance must be a positive integer");
  }
  if (!(config.feeRate >= 0 && config.feeRate < 1)) {
    throw new Error("Fee rate must be in [0, 1)");
  }
  if (!(config.minNotional >= 0)) {
    throw new Error("minNotional must not be negative");
  }
  if (!Number.isInteger(config.maxLeverage) || config.maxLeverage < 1) {
    throw new Error("maxLeverage must be an integer >= 1");
  }
  if (
    !Number.isInteger(config.leverage) ||
    config.leverage < 1 ||
    config.leverage > config.maxLeverage
  ) {
    throw new Error(`leverage must be an integer between 1 and ${config.maxLeverage}`);
  }
  if (config.priceSource === "replay" && !config.replayFile) {
    throw new Error("replayFile is required for the replay price source");
  }
  if (
    config.priceDecimals !== null &&
    (!Number.isInteger(config.priceDecimals) || config.priceDecimals < 0)
  ) {
    throw new Error("priceDecimals must be a non-negative integer");
  }
  if (!(config.tickIntervalMs >= 0)) {
    throw new Error("tickIntervalMs must not be negative");
  }
}
