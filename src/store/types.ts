import type { OrderInput, OrderRequest, Snapshot } from "../types.js";

/**
 * Commands handed to the engine in one tick. Each slot holds at most one
 * request; a newer submission replaces one that was not yet taken.
 */
export interface PendingCommands {
  order: OrderRequest | null;
  leverage: number | null;
  cancellations: number[];
}

/**
 * Engine side of the command boundary, read once per tick
 */
export interface CommandSource {
  /** Return and clear the pending order, leverage request and cancellations */
  takeCommands(): PendingCommands;
}

/**
 * Engine side of the snapshot boundary, written once per tick
 */
export interface SnapshotSink {
  publish(snapshot: Snapshot): void;
}

export interface StateStore extends CommandSource, SnapshotSink {
  /** Drop any previous snapshot and pending commands */
  reset(): void;
}

/**
 * Client side of the command boundary
 */
export interface CommandChannel {
  /** Validate and place an order in the order slot */
  submitOrder(input: OrderInput): void;
  /** Validate and place a leverage change in the leverage slot */
  requestLeverage(leverage: number): void;
  /**
   * Ask the engine to drop an open order.
   * False when the id is not open in the latest snapshot or is already being cancelled.
   */
  cancelOrder(id: number): boolean;
  /** Latest published snapshot, null before the first tick */
  latest(): Snapshot | null;
}

export function emptyCommands(): PendingCommands {
  return { order: null, leverage: null, cancellations: [] };
}
