#!/usr/bin/env node
import { parseArgs } from "node:util";
import { SimulatorClient } from "./client/index.js";
import { DEFAULT_CONFIG } from "./sim/config.js";
import { JsonFileStateStore } from "./store/json-file.js";
import { logger } from "./utils/logger.js";

const USAGE = `Usage: futures-sim-ctl [--state-dir <dir>] <command>

Commands:
  status                  Latest snapshot
  price                   Last tick price
  account                 Balance and total value
  position                Open position
  orders                  Open orders
  buy <qty> [price]       Market buy, or limit buy at price
  sell <qty> [price]      Market sell, or limit sell at price
  cancel <id>             Cancel an open order
  leverage <n>            Request leverage (applies while flat)
  close [price]           Close the whole position`;

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function parseInteger(name: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed)) {
    throw new Error(`${name} must be an integer, got "${value ?? ""}"`);
  }
  return parsed;
}

function run(argv: string[]): void {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      "state-dir": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  const [command, ...args] = positionals;
  if (values.help || !command) {
    console.log(USAGE);
    return;
  }

  const stateDir = values["state-dir"] ?? process.env.STATE_DIR ?? DEFAULT_CONFIG.stateDir;
  const client = new SimulatorClient(new JsonFileStateStore(stateDir));

  switch (command) {
    case "status":
      print(client.getSnapshot());
      return;
    case "price":
      print(client.getPrice());
      return;
    case "account":
      print(client.getAccount());
      return;
    case "position":
      print(client.getPosition());
      return;
    case "orders":
      print(client.getOrders());
      return;
    case "buy":
    case "sell": {
      const [quantity, price] = args;
      if (quantity === undefined) {
        throw new Error(`${command} needs a quantity`);
      }
      client.submitOrder(command, quantity, price);
      print({ submitted: { side: command, quantity, price: price ?? null } });
      return;
    }
    case "cancel":
      print({ cancelled: client.cancelOrder(parseInteger("Order id", args[0])) });
      return;
    case "leverage": {
      const leverage = parseInteger("Leverage", args[0]);
      client.setLeverage(leverage);
      print({ leverage });
      return;
    }
    case "close":
      print({ closing: client.closePosition(args[0]) });
      return;
    default:
      throw new Error(`Unknown command: ${command}\n\n${USAGE}`);
  }
}

try {
  run(process.argv.slice(2));
} catch (error) {
  logger.error("Command failed:", error);
  process.exitCode = 1;
}
