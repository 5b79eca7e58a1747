export { Counter } from "./counter.js";
export type { CounterOptions } from "./counter.js";

export {
  ChangeChannel,
  DIRECTIONS,
  createChangeRecord,
  serializeRecord,
} from "./events.js";
export type { ChangeListener, ChangeRecord, Direction, Unsubscribe } from "./events.js";

export {
  CounterError,
  OverflowError,
  UnderflowError,
  decodeCounterError,
  isCounterError,
} from "./errors.js";

export { fixedClock, logicalClock, systemClock } from "./clock.js";
export type { Clock } from "./clock.js";

export { getConfig, loadConfig, resetConfig } from "./config.js";
export type { Config } from "./config.js";

export { createChildLogger, logger } from "./logger.js";

export {
  applyOperation,
  parseOperation,
  parseScript,
  runScript,
} from "./operations.js";
export type { Operation, OperationKind, ScriptResult } from "./operations.js";

export * from "./evm/abi.js";
export * from "./evm/abiGenerator.js";
export * from "../runtime/index.js";
