import { uintType, type UintBitSize } from "../../runtime/index.js";
import { DIRECTIONS, type Direction } from "../events.js";
import { OPERATION_KINDS, type OperationKind } from "../operations.js";
import { ERROR_KINDS, EVENT_NAMES, functionParamTypes, type CounterErrorKind } from "./abi.js";

/**
 * ABI types following Ethereum JSON ABI specification
 */
export interface AbiParameter {
  name: string;
  type: string;
  indexed?: boolean;
}

export interface AbiFunctionItem {
  type: "function";
  name: string;
  inputs: AbiParameter[];
  outputs: AbiParameter[];
  stateMutability: "view" | "nonpayable";
}

export interface AbiEventItem {
  type: "event";
  name: string;
  inputs: AbiParameter[];
  anonymous: boolean;
}

export interface AbiErrorItem {
  type: "error";
  name: string;
  inputs: AbiParameter[];
}

export type AbiItem = AbiFunctionItem | AbiEventItem | AbiErrorItem;

/**
 * Generate the Ethereum ABI of a counter with the given value width
 */
export function generateCounterAbi(bits: UintBitSize = 256): AbiItem[] {
  const abi: AbiItem[] = [];

  for (const kind of OPERATION_KINDS) {
    abi.push(generateFunctionAbi(kind, bits));
  }

  for (const direction of DIRECTIONS) {
    abi.push(generateEventAbi(direction, bits));
  }

  for (const kind of ERROR_KINDS) {
    abi.push(generateErrorAbi(kind));
  }

  return abi;
}

function generateFunctionAbi(kind: OperationKind, bits: UintBitSize): AbiFunctionItem {
  const isGetter = kind === "get";
  return {
    type: "function",
    name: kind,
    inputs: functionParamTypes(kind, bits).map((type) => ({ name: "value", type })),
    outputs: isGetter ? [{ name: "", type: uintType(bits) }] : [],
    stateMutability: isGetter ? "view" : "nonpayable",
  };
}

function generateEventAbi(direction: Direction, bits: UintBitSize): AbiEventItem {
  return {
    type: "event",
    name: EVENT_NAMES[direction],
    inputs: [
      { name: "newValue", type: uintType(bits), indexed: false },
      { name: "timestamp", type: "uint256", indexed: false },
    ],
    anonymous: false,
  };
}

function generateErrorAbi(kind: CounterErrorKind): AbiErrorItem {
  return {
    type: "error",
    name: kind,
    inputs: [
      { name: "current", type: "uint256" },
      { name: "amount", type: "uint256" },
    ],
  };
}

/**
 * Serialize ABI to JSON string
 */
export function abiToJson(abi: AbiItem[], pretty = true): string {
  return JSON.stringify(abi, null, pretty ? 2 : undefined);
}
