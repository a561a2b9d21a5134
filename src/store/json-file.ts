import {
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import path from "node:path";
import { describeError, isErrnoException } from "../errors.js";
import type { OrderInput, Snapshot } from "../types.js";
import { logger } from "../utils/logger.js";
import { type CommandChannel, type PendingCommands, type StateStore, emptyCommands } from "./types.js";
import {
  type CommandFile,
  CommandFileSchema,
  MAX_LEVERAGE,
  SnapshotSchema,
  parseLeverage,
  parseOrderId,
  parseOrderInput,
  serializeOrder,
} from "./validation.js";

export const STATE_FILE = "state.json";
export const COMMANDS_DIR = "commands";

const log = logger.child("state-file");

let commandSeq = 0;

/**
 * Name for a new command file. Names sort in submission order within a
 * process; across processes, by millisecond.
 */
function commandFileName(): string {
  commandSeq += 1;
  const time = Date.now().toString().padStart(15, "0");
  const seq = commandSeq.toString().padStart(6, "0");
  return `${time}-${process.pid}-${seq}.json`;
}

function readJson(file: string): unknown {
  return JSON.parse(readFileSync(file, "utf8"));
}

/**
 * File-backed state store shared by the engine and control clients.
 *
 * The engine owns `state.json` and rewrites it every tick. Every client
 * command is its own file under `commands/`, written once and never
 * modified; the engine reads and deletes them in name order. Nothing is
 * read-modify-written, so a command is delivered exactly once.
 * All I/O is synchronous and happens inside a tick.
 */
export class JsonFileStateStore implements StateStore, CommandChannel {
  readonly statePath: string;
  readonly commandsDir: string;

  constructor(
    readonly dir: string,
    private readonly maxLeverage = MAX_LEVERAGE
  ) {
    this.statePath = path.join(dir, STATE_FILE);
    this.commandsDir = path.join(dir, COMMANDS_DIR);
    mkdirSync(this.commandsDir, { recursive: true });
  }

  private writeState(snapshot: Snapshot): void {
    const tmp = `${this.statePath}.${process.pid}.tmp`;
    writeFileSync(tmp, `${JSON.stringify(snapshot, null, 2)}\n`, "utf8");
    renameSync(tmp, this.statePath);
  }

  /** Each command gets a fresh file; `wx` refuses to reuse a name */
  private writeCommand(command: CommandFile): void {
    const file = path.join(this.commandsDir, commandFileName());
    const tmp = `${file}.tmp`;
    writeFileSync(tmp, `${JSON.stringify(command)}\n`, { encoding: "utf8", flag: "wx" });
    renameSync(tmp, file);
  }

  /** Command files not yet taken, oldest first */
  private pendingFiles(): string[] {
    return readdirSync(this.commandsDir)
      .filter((name) => name.endsWith(".json"))
      .sort()
      .map((name) => path.join(this.commandsDir, name));
  }

  /**
   * Read one command file. Returns null if the engine took it meanwhile or it
   * does not hold a command.
   */
  private readCommand(file: string): CommandFile | null {
    let raw: unknown;
    try {
      raw = readJson(file);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return null;
      }
      log.warn(`Unreadable command file ${path.basename(file)}: ${describeError(error)}`);
      return null;
    }
    const parsed = CommandFileSchema.safeParse(raw);
    if (!parsed.success) {
      const reason = parsed.error.issues[0]?.message ?? "unknown";
      log.warn(`Invalid command file ${path.basename(file)}: ${reason}`);
      return null;
    }
    return parsed.data;
  }

  submitOrder(input: OrderInput): void {
    const order = parseOrderInput(input);
    this.writeCommand({ type: "order", order: serializeOrder(order) });
  }

  requestLeverage(leverage: number): void {
    const value = parseLeverage(leverage, this.maxLeverage);
    this.writeCommand({ type: "leverage", leverage: value });
  }

  cancelOrder(id: number): boolean {
    const orderId = parseOrderId(id);
    const open = this.latest()?.openOrders.some((order) => order.id === orderId) ?? false;
    if (!open) return false;

    const pending = this.pendingFiles()
      .map((file) => this.readCommand(file))
      .some((command) => command?.type === "cancel" && command.id === orderId);
    if (pending) return false;

    this.writeCommand({ type: "cancel", id: orderId });
    return true;
  }

  latest(): Snapshot | null {
    if (!existsSync(this.statePath)) return null;
    let raw: unknown;
    try {
      raw = readJson(this.statePath);
    } catch (error) {
      log.warn(`Ignoring unreadable ${STATE_FILE}: ${describeError(error)}`);
      return null;
    }
    const parsed = SnapshotSchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  takeCommands(): PendingCommands {
    const commands = emptyCommands();
    for (const file of this.pendingFiles()) {
      const command = this.readCommand(file);
      rmSync(file, { force: true });
      if (command) {
        this.apply(commands, command);
      }
    }
    return commands;
  }

  private apply(commands: PendingCommands, command: CommandFile): void {
    try {
      switch (command.type) {
        case "order":
          commands.order = parseOrderInput(command.order);
          return;
        case "leverage":
          commands.leverage = parseLeverage(command.leverage, this.maxLeverage);
          return;
        case "cancel": {
          const id = parseOrderId(command.id);
          if (!commands.cancellations.includes(id)) {
            commands.cancellations.push(id);
          }
          return;
        }
      }
    } catch (error) {
      log.warn(`Dropping invalid ${command.type} command: ${describeError(error)}`);
    }
  }

  publish(snapshot: Snapshot): void {
    this.writeState(snapshot);
  }

  reset(): void {
    rmSync(this.statePath, { force: true });
    rmSync(this.commandsDir, { recursive: true, force: true });
    mkdirSync(this.commandsDir, { recursive: true });
  }
}
