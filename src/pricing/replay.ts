import { readFileSync } from "node:fs";
import { FeedClosedError } from "../errors.js";
import { type Decimal, parseDecimal } from "../utils/decimal.js";
import { logger } from "../utils/logger.js";
import type { PriceFeed } from "./types.js";

/**
 * Parse replay text: one price per line, or the last field of a CSV line.
 * Blank lines and `#` comments are skipped; malformed lines are logged and skipped.
 */
export function parsePriceLines(text: string, source = "replay"): Decimal[] {
  const prices: Decimal[] = [];
  const lines = text.split(/\r?\n/);
  lines.forEach((line, index) => {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) return;

    const fields = trimmed.split(",");
    const price = parseDecimal(fields[fields.length - 1]);
    if (!price || !price.gt(0)) {
      logger.warn(`${source}:${index + 1}: skipping malformed price line "${trimmed}"`);
      return;
    }
    prices.push(price);
  });
  return prices;
}

/**
 * Feed that plays back a fixed list of prices, then reports itself closed
 */
export class ReplayPriceFeed implements PriceFeed {
  private index = 0;
  private open = false;

  constructor(private readonly prices: readonly Decimal[]) {}

  static fromFile(file: string): ReplayPriceFeed {
    const prices = parsePriceLines(readFileSync(file, "utf8"), file);
    logger.info(`Loaded ${prices.length} replay prices from ${file}`);
    return new ReplayPriceFeed(prices);
  }

  async connect(): Promise<void> {
    this.open = true;
  }

  nextPrice(): Promise<Decimal> {
    if (!this.open) {
      return Promise.reject(new FeedClosedError("Replay feed is closed"));
    }
    const price = this.prices[this.index];
    if (!price) {
      this.open = false;
      return Promise.reject(new FeedClosedError("Replay feed exhausted"));
    }
    this.index += 1;
    return Promise.resolve(price);
  }

  close(): void {
    this.open = false;
  }

  get remaining(): number {
    return this.prices.length - this.index;
  }

  get connected(): boolean {
    return this.open;
  }
}
