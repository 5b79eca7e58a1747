import type { Logger } from "pino";
import { loadConfig, type Config } from "./config.js";
import { Counter } from "./counter.js";
import { serializeRecord } from "./events.js";
import { encodeChangeLog, encodeOperationCalldata } from "./evm/abi.js";
import { abiToJson, generateCounterAbi } from "./evm/abiGenerator.js";
import { parseScript, runScript } from "./operations.js";

type CounterCommand = "run" | "calldata" | "abi";

export interface CliArgs {
  command: CounterCommand | "help" | "version";
  operations: string[];
  bits: string | undefined;
  initial: string | undefined;
  logs: boolean;
}

/** Where the CLI writes and what it reads; stdout carries command output only */
export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  env: NodeJS.ProcessEnv;
  logger: Logger;
}

const DEFAULT_ARGS: CliArgs = {
  command: "help",
  operations: [],
  bits: undefined,
  initial: undefined,
  logs: false,
};

export const VERSION = "bounded-counter v0.1.0";

const HELP = `
bounded-counter - Bounded unsigned integer counter with EVM change logs

USAGE:
  bounded-counter <command> [options]

COMMANDS:
  run <op...>          Apply operations to a fresh counter, print change records
  calldata <op...>     Print the calldata of each operation
  abi                  Print the counter's JSON ABI
  help                 Show this help message
  version              Show version

OPERATIONS:
  increase, increase:<v>, decrease, decrease:<v>, reset, set:<v>, get

OPTIONS:
  --bits <n>           Value width in bits, a multiple of 8 up to 256 (default 256)
  --initial <v>        Initial value (default 0)
  --logs               Print encoded EVM logs instead of records (run only)
  -h, --help           Show help
  -v, --version        Show version

ENVIRONMENT:
  COUNTER_BITS, COUNTER_INITIAL_VALUE, LOG_LEVEL

EXAMPLES:
  bounded-counter run increase:10 decrease:3 set:2 reset
  bounded-counter run increase --bits 8 --initial 255
  bounded-counter calldata increase:5 get
  bounded-counter abi --bits 64
`;

function isCounterCommand(command: string): command is CounterCommand {
  return command === "run" || command === "calldata" || command === "abi";
}

function optionValue(args: string[], index: number, option: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith("--")) {
    throw new Error(`Option ${option} requires a value`);
  }
  return value;
}

export function parseArgs(args: string[]): CliArgs {
  const command = args[0];

  if (!command || command === "help" || args.includes("--help") || args.includes("-h")) {
    return DEFAULT_ARGS;
  }

  if (command === "version" || args.includes("--version") || args.includes("-v")) {
    return { ...DEFAULT_ARGS, command: "version" };
  }

  if (!isCounterCommand(command)) {
    throw new Error(`Unknown command: ${command}`);
  }

  const operations: string[] = [];
  let bits: string | undefined;
  let initial: string | undefined;
  let logs = false;

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg === "--bits") {
      bits = optionValue(args, ++i, arg);
    } else if (arg === "--initial") {
      initial = optionValue(args, ++i, arg);
    } else if (arg === "--logs") {
      logs = true;
    } else {
      operations.push(arg);
    }
  }

  return { command, operations, bits, initial, logs };
}

function resolveConfig(args: CliArgs, env: NodeJS.ProcessEnv): Config {
  return loadConfig({
    ...env,
    ...(args.bits !== undefined ? { COUNTER_BITS: args.bits } : {}),
    ...(args.initial !== undefined ? { COUNTER_INITIAL_VALUE: args.initial } : {}),
  });
}

function run(args: CliArgs, config: Config, io: CliIO): number {
  const counter = new Counter({
    bits: config.bits,
    initialValue: config.initialValue,
    logger: io.logger,
  });
  const result = runScript(counter, parseScript(args.operations));

  for (const record of result.records) {
    io.out(args.logs ? JSON.stringify(encodeChangeLog(record, config.bits)) : serializeRecord(record));
  }

  if (result.error) {
    io.err(result.error.message);
    io.err(`revert data: ${result.error.data}`);
    return 1;
  }

  io.out(`value: ${result.value}`);
  return 0;
}

function execute(args: CliArgs, io: CliIO): number {
  if (args.command === "help") {
    io.out(HELP);
    return 0;
  }

  if (args.command === "version") {
    io.out(VERSION);
    return 0;
  }

  const config = resolveConfig(args, io.env);
  io.logger.level = config.logLevel;

  if (args.command === "abi") {
    io.out(abiToJson(generateCounterAbi(config.bits)));
    return 0;
  }

  if (args.command === "calldata") {
    for (const op of parseScript(args.operations)) {
      io.out(encodeOperationCalldata(op, config.bits));
    }
    return 0;
  }

  return run(args, config, io);
}

/**
 * Run one CLI invocation and return its exit status
 */
export function main(argv: string[], io: CliIO): number {
  try {
    return execute(parseArgs(argv), io);
  } catch (err) {
    io.logger.debug({ err }, "command failed");
    io.err(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
