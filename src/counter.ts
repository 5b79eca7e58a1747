import type { Logger } from "pino";
import { assertUint, maxUint, type u256, type UintBitSize } from "../runtime/index.js";
import { systemClock, type Clock } from "./clock.js";
import { CounterError, OverflowError, UnderflowError } from "./errors.js";
import {
  ChangeChannel,
  createChangeRecord,
  type ChangeListener,
  type Direction,
  type Unsubscribe,
} from "./events.js";
import { logger as rootLogger } from "./logger.js";

export interface CounterOptions {
  /** Width of the value in bits, default 256 */
  bits?: UintBitSize;
  initialValue?: u256;
  clock?: Clock;
  logger?: Logger;
  /** Channel to publish change records on; a private one is created otherwise */
  channel?: ChangeChannel;
}

/**
 * A bounded unsigned integer counter.
 *
 * Every method is synchronous: the read, bounds check, write and emit of one
 * call complete before any other call can observe the value. Failed calls
 * throw a CounterError and leave the value untouched.
 */
export class Counter {
  readonly bits: UintBitSize;
  readonly max: u256;

  private value: u256;
  private readonly clock: Clock;
  private readonly channel: ChangeChannel;
  private readonly logger: Logger;

  constructor(options: CounterOptions = {}) {
    this.bits = options.bits ?? 256;
    this.max = maxUint(this.bits);

    const initialValue = options.initialValue ?? 0n;
    assertUint(initialValue, this.bits, "initial value");
    this.value = initialValue;

    const logger = options.logger ?? rootLogger;
    this.clock = options.clock ?? systemClock;
    this.channel = options.channel ?? new ChangeChannel(logger);
    this.logger = logger.child({ component: "counter", bits: this.bits });
  }

  get(): u256 {
    return this.value;
  }

  onChange(listener: ChangeListener): Unsubscribe {
    return this.channel.subscribe(listener);
  }

  increaseByOne(): u256 {
    return this.increase(1n, "increaseByOne");
  }

  increaseByValue(value: u256): u256 {
    return this.increase(value, "increaseByValue");
  }

  decreaseByOne(): u256 {
    return this.decrease(1n, "decreaseByOne");
  }

  decreaseByValue(value: u256): u256 {
    return this.decrease(value, "decreaseByValue");
  }

  /**
   * Set the value to 0. Always reported as a decrease, even from 0.
   */
  reset(): u256 {
    return this.commit(0n, "Decreased", "reset");
  }

  /**
   * Overwrite the value. Always reported as an increase, whatever the previous value.
   */
  set(value: u256): u256 {
    assertUint(value, this.bits);
    return this.commit(value, "Increased", "set");
  }

  private increase(amount: u256, operation: string): u256 {
    assertUint(amount, this.bits, "amount");
    // Compare against the remaining headroom instead of forming the sum
    if (amount > this.max - this.value) {
      this.reject(new OverflowError(this.value, amount), operation);
    }
    return this.commit(this.value + amount, "Increased", operation);
  }

  private decrease(amount: u256, operation: string): u256 {
    assertUint(amount, this.bits, "amount");
    if (amount > this.value) {
      this.reject(new UnderflowError(this.value, amount), operation);
    }
    return this.commit(this.value - amount, "Decreased", operation);
  }

  private commit(newValue: u256, direction: Direction, operation: string): u256 {
    // The record is built before the write; a throwing clock leaves the value as it was
    const record = createChangeRecord(newValue, this.clock(), direction);
    this.value = newValue;
    this.logger.debug({ operation, newValue: newValue.toString(), direction }, "counter changed");
    this.channel.emit(record);
    return newValue;
  }

  private reject(error: CounterError, operation: string): never {
    this.logger.warn(
      {
        operation,
        kind: error.kind,
        current: error.current.toString(),
        amount: error.amount.toString(),
      },
      "mutation rejected"
    );
    throw error;
  }
}
