import {
  concat,
  decodeAbiParameters,
  encodeAbiParameters,
  keccak256,
  size,
  slice,
  toBytes,
  type Hex,
} from "viem";
import { assertUint, maxUint, uintType, type UintBitSize } from "../../runtime/index.js";
import { createChangeRecord, DIRECTIONS, type ChangeRecord, type Direction } from "../events.js";
import type { Operation, OperationKind } from "../operations.js";

/** A raw EVM log as returned by eth_getLogs */
export interface EvmLog {
  topics: readonly Hex[];
  data: Hex;
}

export type CounterErrorKind = "Overflow" | "Underflow";

export const ERROR_KINDS: readonly CounterErrorKind[] = ["Overflow", "Underflow"];

export const EVENT_NAMES: Record<Direction, string> = {
  Increased: "CountIncreased",
  Decreased: "CountDecreased",
};

// Two 32-byte words. Every unsigned width pads to a full word, so the data
// layout is the same for uint8 ... uint256; only the signatures differ.
const TWO_WORDS = [{ type: "uint256" }, { type: "uint256" }] as const;
const ONE_WORD = [{ type: "uint256" }] as const;

// selector + (current, amount)
const REVERT_DATA_SIZE = 4 + 64;

/**
 * Compute function signature
 * e.g., "increaseByValue(uint256)"
 */
export function computeSignature(name: string, paramTypes: readonly string[]): string {
  return `${name}(${paramTypes.join(",")})`;
}

/**
 * Compute function selector from function name and parameter types
 * selector = keccak256(signature)[0:4]
 */
export function computeSelector(name: string, paramTypes: readonly string[]): Hex {
  const hash = keccak256(toBytes(computeSignature(name, paramTypes)));
  return slice(hash, 0, 4);
}

/** Solidity parameter types of a counter function */
export function functionParamTypes(kind: OperationKind, bits: UintBitSize): string[] {
  switch (kind) {
    case "increaseByValue":
    case "decreaseByValue":
    case "set":
      return [uintType(bits)];
    case "increaseByOne":
    case "decreaseByOne":
    case "reset":
    case "get":
      return [];
  }
}

/**
 * Event signature (topic0) of a change record direction
 * e.g., keccak256("CountIncreased(uint256,uint256)")
 */
export function computeEventTopic(direction: Direction, bits: UintBitSize): Hex {
  const signature = computeSignature(EVENT_NAMES[direction], [uintType(bits), "uint256"]);
  return keccak256(toBytes(signature));
}

/**
 * Custom error selector, e.g. the first 4 bytes of keccak256("Overflow(uint256,uint256)")
 */
export function computeErrorSelector(kind: CounterErrorKind): Hex {
  return computeSelector(kind, ["uint256", "uint256"]);
}

/**
 * Revert data of a counter error: selector followed by (current, amount)
 */
export function encodeRevertData(kind: CounterErrorKind, current: bigint, amount: bigint): Hex {
  return concat([computeErrorSelector(kind), encodeAbiParameters(TWO_WORDS, [current, amount])]);
}

export interface DecodedRevert {
  kind: CounterErrorKind;
  current: bigint;
  amount: bigint;
}

/**
 * Decode revert data produced by encodeRevertData. Returns null for any other error.
 */
export function decodeRevertData(data: Hex): DecodedRevert | null {
  if (size(data) !== REVERT_DATA_SIZE) return null;

  const selector = slice(data, 0, 4).toLowerCase();
  const kind = ERROR_KINDS.find((k) => computeErrorSelector(k) === selector);
  if (!kind) return null;

  const [current, amount] = decodeAbiParameters(TWO_WORDS, slice(data, 4));
  return { kind, current, amount };
}

/**
 * Encode a change record as the log the counter contract would emit
 */
export function encodeChangeLog(record: ChangeRecord, bits: UintBitSize = 256): EvmLog {
  assertUint(record.newValue, bits, "newValue");
  return {
    topics: [computeEventTopic(record.direction, bits)],
    data: encodeAbiParameters(TWO_WORDS, [record.newValue, record.timestamp]),
  };
}

/**
 * Decode a counter log back into a change record.
 * Logs of other events decode to null.
 */
export function decodeChangeLog(log: EvmLog, bits: UintBitSize = 256): ChangeRecord | null {
  const topic = log.topics[0];
  if (topic === undefined) return null;

  const normalized = topic.toLowerCase();
  const direction = DIRECTIONS.find((d) => computeEventTopic(d, bits) === normalized);
  if (!direction) return null;

  const [newValue, timestamp] = decodeAbiParameters(TWO_WORDS, log.data);
  if (newValue > maxUint(bits)) {
    throw new RangeError(`Log value ${newValue} does not fit ${uintType(bits)}`);
  }
  return createChangeRecord(newValue, timestamp, direction);
}

/**
 * Encode calldata for an operation: selector (4 bytes) + args (32 bytes each)
 */
export function encodeOperationCalldata(op: Operation, bits: UintBitSize = 256): Hex {
  const selector = computeSelector(op.kind, functionParamTypes(op.kind, bits));
  if (!("value" in op)) return selector;

  assertUint(op.value, bits);
  return concat([selector, encodeAbiParameters(ONE_WORD, [op.value])]);
}
