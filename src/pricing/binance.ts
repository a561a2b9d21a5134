import WebSocket from "ws";
import { z } from "zod";
import { FeedClosedError, describeError } from "../errors.js";
import { type Decimal, parseDecimal } from "../utils/decimal.js";
import { logger } from "../utils/logger.js";
import { TickBuffer } from "./tick-buffer.js";
import type { PriceFeed } from "./types.js";

export const BINANCE_FUTURES_WS_URL = "wss://fstream.binance.com/ws";

const RECONNECT_DELAY_MS = 5000;
const SUBSCRIPTION_ID = 1;

/**
 * 24h rolling mini ticker, pushed about once a second. Only the fields the
 * feed reads are checked.
 */
export const MiniTickerSchema = z.object({
  e: z.literal("24hrMiniTicker"), // Event type
  E: z.number(), // Event time
  s: z.string(), // Symbol
  c: z.string(), // Close price <--- the tick
});

export type BinanceMiniTicker = z.infer<typeof MiniTickerSchema>;

/** Reply to a SUBSCRIBE request: {"result":null,"id":1} */
const SubscriptionResponseSchema = z.object({
  id: z.number(),
  result: z.unknown(),
});

const MessageSchema = z.record(z.string(), z.unknown());

export type BinanceMessage =
  | { type: "ack"; id: number }
  | { type: "price"; price: Decimal; eventTime: number }
  | { type: "ignored" };

export interface BinancePriceFeedOptions {
  url?: string;
  /** Reconnect after a lost connection instead of failing the feed */
  reconnect?: boolean;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.replace("/", "").trim().toLowerCase();
}

export function buildSubscriptionMessage(
  method: "SUBSCRIBE" | "UNSUBSCRIBE",
  symbol: string,
  id = SUBSCRIPTION_ID
): string {
  return JSON.stringify({
    method,
    params: [`${normalizeSymbol(symbol)}@miniTicker`],
    id,
  });
}

/**
 * Classify one stream message. Throws on anything that should have been a
 * tick but is not usable.
 */
export function parseBinanceMessage(raw: string): BinanceMessage {
  const message = MessageSchema.safeParse(JSON.parse(raw));
  if (!message.success) {
    throw new Error(`Unexpected message: ${raw}`);
  }

  if ("result" in message.data) {
    const response = SubscriptionResponseSchema.safeParse(message.data);
    if (response.success) {
      if (response.data.result !== null) {
        throw new Error(`Subscription request ${response.data.id} failed: ${raw}`);
      }
      return { type: "ack", id: response.data.id };
    }
  }

  const ticker = MiniTickerSchema.safeParse(message.data);
  if (!ticker.success) {
    return { type: "ignored" };
  }

  const price = parseDecimal(ticker.data.c);
  if (!price || !price.gt(0)) {
    throw new Error(`Invalid close price in ticker: ${ticker.data.c}`);
  }
  return { type: "price", price, eventTime: ticker.data.E };
}

/**
 * Binance USDⓈ-M futures mini ticker feed for a single symbol
 */
export class BinancePriceFeed implements PriceFeed {
  private ws: WebSocket | null = null;
  private readonly symbol: string;
  private readonly url: string;
  private readonly reconnect: boolean;
  private readonly buffer = new TickBuffer();
  private reconnectTimeout: NodeJS.Timeout | null = null;
  private shouldReconnect = true;
  private lastPrice: Decimal | null = null;
  private lastTimestamp: number | null = null;

  constructor(symbol: string, options: BinancePriceFeedOptions = {}) {
    this.symbol = normalizeSymbol(symbol);
    this.url = options.url ?? BINANCE_FUTURES_WS_URL;
    this.reconnect = options.reconnect ?? false;
  }

  /**
   * Open the socket and subscribe; resolves once Binance acknowledges the subscription
   */
  async connect(): Promise<void> {
    if (this.ws) return;

    this.shouldReconnect = true;
    this.buffer.reopen();

    return new Promise((resolve, reject) => {
      logger.info(`Connecting to Binance Futures: ${this.url} (${this.symbol}@miniTicker)`);
      const ws = new WebSocket(this.url);
      this.ws = ws;
      let subscribed = false;

      ws.on("open", () => {
        ws.send(buildSubscriptionMessage("SUBSCRIBE", this.symbol));
      });

      ws.on("message", (data: WebSocket.RawData) => {
        let message: BinanceMessage;
        try {
          message = parseBinanceMessage(data.toString());
        } catch (error) {
          if (!subscribed) {
            reject(error instanceof Error ? error : new Error(describeError(error)));
            ws.close();
            return;
          }
          logger.warn(`Skipping malformed Binance message: ${describeError(error)}`);
          return;
        }

        if (message.type === "ack") {
          if (!subscribed && message.id === SUBSCRIPTION_ID) {
            subscribed = true;
            logger.info(`Binance Futures feed ACTIVE: ${this.symbol}`);
            resolve();
          }
          return;
        }

        if (message.type === "price") {
          this.lastPrice = message.price;
          this.lastTimestamp = message.eventTime;
          this.buffer.push(message.price);
        }
      });

      ws.on("close", () => {
        if (this.ws === ws) {
          this.ws = null;
        }
        if (!subscribed) {
          // Never went live; connect() reports it and the caller decides
          reject(new FeedClosedError(`Binance connection closed before subscribing to ${this.symbol}`));
          return;
        }
        if (this.shouldReconnect && this.reconnect) {
          this.scheduleReconnect();
          return;
        }
        if (this.shouldReconnect) {
          logger.error(`Binance connection lost for ${this.symbol}`);
        }
        this.buffer.close(new FeedClosedError(`Binance feed for ${this.symbol} closed`));
      });

      ws.on("error", (err) => {
        logger.error("Binance socket error:", err);
        if (!subscribed) {
          reject(err);
        }
      });
    });
  }

  /**
   * Schedule a reconnection attempt
   */
  private scheduleReconnect(): void {
    if (this.reconnectTimeout || !this.shouldReconnect) {
      return;
    }

    logger.info(`Scheduling Binance reconnection in ${RECONNECT_DELAY_MS / 1000} seconds...`);
    this.reconnectTimeout = setTimeout(() => {
      this.reconnectTimeout = null;
      this.connect().catch((error: unknown) => {
        logger.error("Binance reconnection failed:", error);
        if (this.shouldReconnect) {
          this.scheduleReconnect();
        }
      });
    }, RECONNECT_DELAY_MS);
  }

  nextPrice(): Promise<Decimal> {
    return this.buffer.next();
  }

  /**
   * Unsubscribe and disconnect. Pending and later nextPrice() calls fail with FeedClosedError.
   */
  close(): void {
    logger.info("Disconnecting from Binance price feed");
    this.shouldReconnect = false;

    if (this.reconnectTimeout) {
      clearTimeout(this.reconnectTimeout);
      this.reconnectTimeout = null;
    }

    if (this.ws) {
      if (this.ws.readyState === WebSocket.OPEN) {
        this.ws.send(buildSubscriptionMessage("UNSUBSCRIBE", this.symbol));
      }
      this.ws.close();
      this.ws = null;
    }
    this.buffer.close(new FeedClosedError(`Binance feed for ${this.symbol} closed`));
  }

  getLastPrice(): Decimal | null {
    return this.lastPrice;
  }

  getLastTimestamp(): number | null {
    return this.lastTimestamp;
  }

  /** A reconnection attempt is pending */
  get reconnecting(): boolean {
    return this.reconnectTimeout !== null;
  }

  get connected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }
}
