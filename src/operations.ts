import { isUintLiteral, type u256 } from "../runtime/index.js";
import type { Counter } from "./counter.js";
import { isCounterError, type CounterError } from "./errors.js";
import type { ChangeRecord } from "./events.js";

export type Operation =
  | { readonly kind: "increaseByOne" }
  | { readonly kind: "increaseByValue"; readonly value: u256 }
  | { readonly kind: "decreaseByOne" }
  | { readonly kind: "decreaseByValue"; readonly value: u256 }
  | { readonly kind: "reset" }
  | { readonly kind: "set"; readonly value: u256 }
  | { readonly kind: "get" };

export type OperationKind = Operation["kind"];

export const OPERATION_KINDS: readonly OperationKind[] = [
  "increaseByOne",
  "increaseByValue",
  "decreaseByOne",
  "decreaseByValue",
  "reset",
  "get",
  "set",
];

function parseValue(text: string, token: string): u256 {
  if (!isUintLiteral(text)) {
    throw new Error(`Invalid value "${text}" in operation "${token}"`);
  }
  return BigInt(text);
}

function noArgument(token: string, arg: string | undefined): void {
  if (arg !== undefined) {
    throw new Error(`Operation "${token}" takes no value`);
  }
}

/**
 * Parse one operation token.
 *
 *   increase | increase:<v> | decrease | decrease:<v> | reset | set:<v> | get
 */
export function parseOperation(token: string): Operation {
  const [name, arg, ...rest] = token.split(":");
  if (rest.length > 0) {
    throw new Error(`Malformed operation "${token}"`);
  }

  switch (name) {
    case "increase":
      return arg === undefined
        ? { kind: "increaseByOne" }
        : { kind: "increaseByValue", value: parseValue(arg, token) };
    case "decrease":
      return arg === undefined
        ? { kind: "decreaseByOne" }
        : { kind: "decreaseByValue", value: parseValue(arg, token) };
    case "reset":
      noArgument(token, arg);
      return { kind: "reset" };
    case "get":
      noArgument(token, arg);
      return { kind: "get" };
    case "set":
      if (arg === undefined) {
        throw new Error(`Operation "set" requires a value, e.g. set:42`);
      }
      return { kind: "set", value: parseValue(arg, token) };
    default:
      throw new Error(`Unknown operation: ${name}`);
  }
}

export function parseScript(tokens: readonly string[]): Operation[] {
  return tokens.map(parseOperation);
}

/**
 * Apply one operation and return the counter value it leaves
 */
export function applyOperation(counter: Counter, op: Operation): u256 {
  switch (op.kind) {
    case "increaseByOne":
      return counter.increaseByOne();
    case "increaseByValue":
      return counter.increaseByValue(op.value);
    case "decreaseByOne":
      return counter.decreaseByOne();
    case "decreaseByValue":
      return counter.decreaseByValue(op.value);
    case "reset":
      return counter.reset();
    case "set":
      return counter.set(op.value);
    case "get":
      return counter.get();
  }
}

export interface ScriptResult {
  /** Records emitted by the operations that succeeded */
  records: ChangeRecord[];
  /** Number of operations applied before stopping */
  completed: number;
  value: u256;
  error: CounterError | null;
}

/**
 * Apply operations in order, stopping at the first counter error.
 * Errors other than CounterError propagate.
 */
export function runScript(counter: Counter, ops: readonly Operation[]): ScriptResult {
  const records: ChangeRecord[] = [];
  const unsubscribe = counter.onChange((record) => records.push(record));

  let completed = 0;
  try {
    for (const op of ops) {
      applyOperation(counter, op);
      completed++;
    }
    return { records, completed, value: counter.get(), error: null };
  } catch (err) {
    if (!isCounterError(err)) throw err;
    return { records, completed, value: counter.get(), error: err };
  } finally {
    unsubscribe();
  }
}
