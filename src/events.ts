import type { Logger } from "pino";
import type { Event, u256 } from "../runtime/index.js";
import { logger as rootLogger } from "./logger.js";

export type Direction = "Increased" | "Decreased";

export const DIRECTIONS: readonly Direction[] = ["Increased", "Decreased"];

/**
 * Emitted once per successful mutation. Never stored by the counter.
 */
export interface ChangeRecord {
  readonly newValue: u256;
  readonly timestamp: u256;
  readonly direction: Direction;
}

export type ChangeListener = (record: ChangeRecord) => void;
export type Unsubscribe = () => void;

export function createChangeRecord(newValue: u256, timestamp: u256, direction: Direction): ChangeRecord {
  return Object.freeze({ newValue, timestamp, direction });
}

/**
 * JSON form of a record, with integers as decimal strings
 */
export function serializeRecord(record: ChangeRecord): string {
  return JSON.stringify({
    newValue: record.newValue.toString(),
    timestamp: record.timestamp.toString(),
    direction: record.direction,
  });
}

/**
 * Synchronous fan-out of change records.
 *
 * Records emitted while another record is being delivered (a listener that
 * mutates the counter) are queued, so every listener sees records in mutation
 * order. A throwing listener is logged and skipped; it never fails the emit.
 */
export class ChangeChannel implements Event<ChangeRecord> {
  private listeners: ChangeListener[] = [];
  private pending: ChangeRecord[] = [];
  private delivering = false;
  private readonly logger: Logger;

  constructor(logger: Logger = rootLogger) {
    this.logger = logger.child({ component: "change-channel" });
  }

  get listenerCount(): number {
    return this.listeners.length;
  }

  subscribe(listener: ChangeListener): Unsubscribe {
    // Copy on write: a delivery in progress keeps iterating its own snapshot
    this.listeners = [...this.listeners, listener];
    let subscribed = true;
    return () => {
      if (!subscribed) return;
      subscribed = false;
      const index = this.listeners.indexOf(listener);
      if (index !== -1) {
        this.listeners = [...this.listeners.slice(0, index), ...this.listeners.slice(index + 1)];
      }
    };
  }

  emit(record: ChangeRecord): void {
    this.pending.push(record);
    if (this.delivering) return;

    this.delivering = true;
    try {
      for (let next = this.pending.shift(); next !== undefined; next = this.pending.shift()) {
        this.deliver(next);
      }
    } finally {
      this.delivering = false;
    }
  }

  private deliver(record: ChangeRecord): void {
    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (err) {
        this.logger.error(
          { err, newValue: record.newValue.toString(), direction: record.direction },
          "change listener failed"
        );
      }
    }
  }
}
