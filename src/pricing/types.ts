import type { Decimal } from "../utils/decimal.js";

export type PriceSource = "binance" | "replay";

/**
 * Pull-based source of price ticks for a single symbol
 */
export interface PriceFeed {
  connect(): Promise<void>;
  /** Resolve with the next tick; rejects with FeedClosedError once the feed is done */
  nextPrice(): Promise<Decimal>;
  close(): void;
  readonly connected: boolean;
}
