export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LOG_LEVELS, value);
}

function serializeArg(value: unknown): string {
  if (value instanceof Error) {
    return value.stack ?? `${value.name}: ${value.message}`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

interface LoggerSettings {
  level: LogLevel;
}

class Logger {
  // Shared with child loggers so setLevel reaches them too
  private readonly settings: LoggerSettings;
  private readonly scope: string | null;

  constructor(level: LogLevel | LoggerSettings = "info", scope: string | null = null) {
    this.settings = typeof level === "string" ? { level } : level;
    this.scope = scope;
  }

  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  getLevel(): LogLevel {
    return this.settings.level;
  }

  /**
   * Create a logger that prefixes every line with `[scope]`
   */
  child(scope: string): Logger {
    return new Logger(this.settings, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.settings.level];
  }

  private formatMessage(level: LogLevel, message: string, args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);
    const scopeStr = this.scope ? ` [${this.scope}]` : "";
    const argsStr = args.length > 0 ? ` ${args.map(serializeArg).join(" ")}` : "";
    return `[${timestamp}] [${levelStr}]${scopeStr} ${message}${argsStr}`;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.debug(this.formatMessage("debug", message, args));
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.info(this.formatMessage("info", message, args));
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.warn(this.formatMessage("warn", message, args));
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(this.formatMessage("error", message, args));
    }
  }
}

// Default instance, level from LOG_LEVEL
const envLevel = process.env.LOG_LEVEL?.toLowerCase();
export const logger = new Logger(isLogLevel(envLevel) ? envLevel : "info");

export { Logger };
