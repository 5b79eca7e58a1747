import type { Hex } from "viem";
import type { u256 } from "../runtime/index.js";
import {
  computeErrorSelector,
  decodeRevertData,
  encodeRevertData,
  type CounterErrorKind,
} from "./evm/abi.js";

export type { CounterErrorKind };

/**
 * A rejected mutation. Thrown before any state changes; no record is emitted.
 *
 * Mirrors the contract's custom errors `Overflow(uint256 current, uint256 amount)`
 * and `Underflow(uint256 current, uint256 amount)`.
 */
export class CounterError extends Error {
  readonly kind: CounterErrorKind;
  /** Value before the rejected call */
  readonly current: u256;
  /** Amount the call tried to add or subtract */
  readonly amount: u256;

  constructor(kind: CounterErrorKind, current: u256, amount: u256, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.current = current;
    this.amount = amount;
  }

  get selector(): Hex {
    return computeErrorSelector(this.kind);
  }

  /** ABI-encoded revert data */
  get data(): Hex {
    return encodeRevertData(this.kind, this.current, this.amount);
  }
}

export class OverflowError extends CounterError {
  constructor(current: u256, amount: u256) {
    super("Overflow", current, amount, `Overflow: cannot increase ${current} by ${amount}`);
  }
}

export class UnderflowError extends CounterError {
  constructor(current: u256, amount: u256) {
    super("Underflow", current, amount, `Underflow: cannot decrease ${current} by ${amount}`);
  }
}

export function isCounterError(err: unknown): err is CounterError {
  return err instanceof CounterError;
}

/**
 * Rebuild a counter error from revert data, or null if the data is not one
 */
export function decodeCounterError(data: Hex): CounterError | null {
  const decoded = decodeRevertData(data);
  if (!decoded) return null;

  return decoded.kind === "Overflow"
    ? new OverflowError(decoded.current, decoded.amount)
    : new UnderflowError(decoded.current, decoded.amount);
}
