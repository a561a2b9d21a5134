/**
 * Raised at the command boundary for a malformed order or leverage request.
 * Nothing that fails validation is ever queued.
 */
export class OrderValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "OrderValidationError";
  }
}

/**
 * Raised by a price feed that will not produce another tick: the connection
 * was lost (and no reconnect is configured), the feed was closed, or a replay
 * ran out of prices.
 */
export class FeedClosedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FeedClosedError";
  }
}

function hasProp<K extends PropertyKey>(obj: unknown, key: K): obj is Record<K, unknown> {
  return obj !== null && typeof obj === "object" && key in obj;
}

/** Render any thrown value as a single log-friendly line */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  if (typeof error === "string") {
    return error;
  }
  if (hasProp(error, "message") && typeof error.message === "string") {
    return error.message;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && hasProp(error, "code");
}
