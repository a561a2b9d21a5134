// Library entry: engine, feeds, stores and client

export { FuturesSimulator } from "./sim/engine.js";
export type { EngineOptions, EngineState, TickReport } from "./sim/engine.js";
export { Position, sideSign } from "./sim/position.js";
export type { DecreaseResult } from "./sim/position.js";
export { OrderQueue, isEligible } from "./sim/orders.js";
export { executionPrice, matchOrders, openingCost } from "./sim/matching.js";
export type { FillAction, MatchContext, MatchResult, RejectReason } from "./sim/matching.js";
export { checkLiquidation, isLiquidated } from "./sim/liquidation.js";
export type { LiquidationEvent } from "./sim/liquidation.js";
export { buildSnapshot } from "./sim/snapshot.js";
export {
  DEFAULT_CONFIG,
  loadConfigFromEnv,
  mergeConfig,
  validateConfig,
} from "./sim/config.js";
export type { SimulatorConfig } from "./sim/config.js";

export * from "./pricing/index.js";

export { MemoryStateStore } from "./store/memory.js";
export { JsonFileStateStore } from "./store/json-file.js";
export {
  CommandFileSchema,
  OrderInputSchema,
  SnapshotSchema,
  parseLeverage,
  parseOrderInput,
} from "./store/validation.js";
export type {
  CommandChannel,
  CommandSource,
  PendingCommands,
  SnapshotSink,
  StateStore,
} from "./store/types.js";

export { SimulatorClient } from "./client/index.js";
export type { AccountSummary } from "./client/index.js";

export { FeedClosedError, OrderValidationError, describeError } from "./errors.js";
export { Decimal } from "./utils/decimal.js";
export { Logger, logger } from "./utils/logger.js";
export type * from "./types.js";
