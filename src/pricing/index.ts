import type { SimulatorConfig } from "../sim/config.js";
import { logger } from "../utils/logger.js";
import { BinancePriceFeed } from "./binance.js";
import { ReplayPriceFeed } from "./replay.js";
import type { PriceFeed, PriceSource } from "./types.js";

/**
 * Create a price feed by source name
 */
export function createPriceFeed(
  config: Pick<SimulatorConfig, "symbol" | "priceSource" | "replayFile" | "wsUrl" | "reconnect">
): PriceFeed {
  logger.info(`Creating price feed: ${config.priceSource} for ${config.symbol}`);

  switch (config.priceSource) {
    case "binance":
      return new BinancePriceFeed(config.symbol, {
        url: config.wsUrl,
        reconnect: config.reconnect,
      });

    case "replay":
      if (!config.replayFile) {
        throw new Error("A replay file is required for the replay price source");
      }
      return ReplayPriceFeed.fromFile(config.replayFile);

    default:
      throw new Error(`Unknown price source: ${String(config.priceSource)}. Supported: binance, replay`);
  }
}

/**
 * Get list of supported price sources
 */
export function getSupportedPriceSources(): PriceSource[] {
  return ["binance", "replay"];
}

export {
  BinancePriceFeed,
  buildSubscriptionMessage,
  normalizeSymbol,
  parseBinanceMessage,
} from "./binance.js";
export type { BinanceMessage, BinancePriceFeedOptions } from "./binance.js";
export { ReplayPriceFeed, parsePriceLines } from "./replay.js";
export { TickBuffer } from "./tick-buffer.js";
export type { PriceFeed, PriceSource } from "./types.js";
