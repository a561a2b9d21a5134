import { z } from "zod";
import { OrderValidationError } from "../errors.js";
import type { OrderInput, OrderRequest } from "../types.js";
import { Decimal, parseDecimal } from "../utils/decimal.js";

/** Binance caps USDⓈ-M futures leverage at 125x */
export const MAX_LEVERAGE = 125;

const POSITIVE_NUMBER = "must be a positive number";

/**
 * Positive decimal from a numeric string, number or Decimal
 */
export const PositiveDecimalSchema = z
  .union([z.string(), z.number(), z.instanceof(Decimal)], {
    errorMap: () => ({ message: POSITIVE_NUMBER }),
  })
  .transform((value, ctx) => {
    const parsed = parseDecimal(value);
    if (!parsed || !parsed.gt(0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: POSITIVE_NUMBER });
      return z.NEVER;
    }
    return parsed;
  });

const BUY_OR_SELL = 'must be "buy" or "sell"';

export const SideSchema = z
  .string({ required_error: BUY_OR_SELL, invalid_type_error: BUY_OR_SELL })
  .trim()
  .toLowerCase()
  .pipe(z.enum(["buy", "sell"], { errorMap: () => ({ message: BUY_OR_SELL }) }));

/**
 * Client order, as submitted or read back from a command file
 */
export const OrderInputSchema = z.object(
  {
    side: SideSchema,
    quantity: PositiveDecimalSchema,
    price: PositiveDecimalSchema.nullish(),
  },
  { invalid_type_error: "must be an object" }
);

export const OrderIdSchema = z.number().int().positive();

export function leverageSchema(maxLeverage: number): z.ZodNumber {
  return z.number().int().min(1).max(maxLeverage);
}

/**
 * One command file in the state directory. Payloads are checked separately so
 * that a bad payload can be reported on its own.
 */
export const CommandFileSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("order"), order: z.unknown() }),
  z.object({ type: z.literal("leverage"), leverage: z.unknown() }),
  z.object({ type: z.literal("cancel"), id: z.unknown() }),
]);

export type CommandFile = z.infer<typeof CommandFileSchema>;

const DecimalStringSchema = z.string().regex(/^\d+(\.\d+)?$/);

export const PositionSnapshotSchema = z.object({
  side: z.enum(["long", "short"]),
  quantity: DecimalStringSchema,
  entryPrice: z.number(),
  leverage: z.number().int(),
  liquidationPrice: z.number(),
  pnl: z.number(),
  margin: z.number(),
});

export const OrderSnapshotSchema = z.object({
  id: z.number().int(),
  side: z.enum(["buy", "sell"]),
  type: z.enum(["limit", "market"]),
  quantity: DecimalStringSchema,
  price: z.number().nullable(),
  createdAt: z.string(),
});

export const SnapshotSchema = z.object({
  symbol: z.string(),
  timestamp: z.string(),
  price: z.number(),
  balance: z.number(),
  totalValue: z.number(),
  leverage: z.number().int(),
  position: PositionSnapshotSchema.nullable(),
  openOrders: z.array(OrderSnapshotSchema),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")} ${issue.message}` : issue.message
    )
    .join("; ");
}

/**
 * Validate a client order. Accepts `OrderInput` or anything read back from disk.
 */
export function parseOrderInput(input: unknown): OrderRequest {
  const parsed = OrderInputSchema.safeParse(input);
  if (!parsed.success) {
    throw new OrderValidationError(`Invalid order: ${describeIssues(parsed.error)}`);
  }

  const { side, quantity, price } = parsed.data;
  const request: OrderRequest = { side, quantity };
  if (price) {
    request.limitPrice = price;
  }
  return request;
}

export function parseLeverage(value: unknown, maxLeverage = MAX_LEVERAGE): number {
  const parsed = leverageSchema(maxLeverage).safeParse(value);
  if (!parsed.success) {
    throw new OrderValidationError(
      `Leverage must be an integer between 1 and ${maxLeverage}, got ${JSON.stringify(value)}`
    );
  }
  return parsed.data;
}

export function parseOrderId(value: unknown): number {
  const parsed = OrderIdSchema.safeParse(value);
  if (!parsed.success) {
    throw new OrderValidationError(`Order id must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return parsed.data;
}

/** Wire form of a validated order, as stored in a command file */
export function serializeOrder(order: OrderRequest): OrderInput {
  return {
    side: order.side,
    quantity: order.quantity.toString(),
    price: order.limitPrice ? order.limitPrice.toString() : null,
  };
}
