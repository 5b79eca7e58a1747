import { describe, it, expect } from "vitest";
import { pino } from "pino";
import { fixedClock } from "../../src/clock.js";
import { Counter } from "../../src/counter.js";
import {
  ChangeChannel,
  createChangeRecord,
  serializeRecord,
  type ChangeRecord,
} from "../../src/events.js";

const silent = pino({ level: "silent" });

function captureLogger() {
  const lines: string[] = [];
  const log = pino({ level: "error" }, { write: (line: string) => lines.push(line) });
  return { log, lines };
}

describe("ChangeChannel", () => {
  describe("subscribe", () => {
    it("should deliver to every listener in subscription order", () => {
      const channel = new ChangeChannel(silent);
      const calls: string[] = [];
      channel.subscribe(() => calls.push("first"));
      channel.subscribe(() => calls.push("second"));

      channel.emit(createChangeRecord(1n, 0n, "Increased"));

      expect(calls).toEqual(["first", "second"]);
    });

    it("should deliver nothing without listeners", () => {
      const channel = new ChangeChannel(silent);
      expect(channel.listenerCount).toBe(0);
      expect(() => channel.emit(createChangeRecord(1n, 0n, "Increased"))).not.toThrow();
    });

    it("should track listeners through unsubscribe", () => {
      const channel = new ChangeChannel(silent);
      const unsubscribe = channel.subscribe(() => {});
      channel.subscribe(() => {});
      expect(channel.listenerCount).toBe(2);

      unsubscribe();
      unsubscribe();
      expect(channel.listenerCount).toBe(1);
    });
  });

  describe("listener failures", () => {
    it("should log the failure and keep delivering", () => {
      const { log, lines } = captureLogger();
      const channel = new ChangeChannel(log);
      const seen: ChangeRecord[] = [];
      channel.subscribe(() => {
        throw new Error("indexer offline");
      });
      channel.subscribe((record) => seen.push(record));

      channel.emit(createChangeRecord(3n, 0n, "Decreased"));

      expect(seen).toHaveLength(1);
      expect(lines).toHaveLength(1);
      const entry = JSON.parse(lines[0] ?? "{}");
      expect(entry).toMatchObject({
        level: 50,
        msg: "change listener failed",
        component: "change-channel",
        newValue: "3",
        direction: "Decreased",
      });
      expect(entry.err.message).toBe("indexer offline");
    });
  });

  describe("re-entrant emits", () => {
    it("should deliver nested records after the current one", () => {
      const counter = new Counter({ clock: fixedClock(0n), logger: silent });
      const first: bigint[] = [];
      const second: bigint[] = [];

      counter.onChange((record) => {
        first.push(record.newValue);
        if (record.newValue === 1n) counter.increaseByOne();
      });
      counter.onChange((record) => second.push(record.newValue));

      counter.increaseByOne();

      expect(counter.get()).toBe(2n);
      expect(first).toEqual([1n, 2n]);
      expect(second).toEqual([1n, 2n]);
    });

    it("should apply unsubscribe from the next record", () => {
      const channel = new ChangeChannel(silent);
      const seen: bigint[] = [];
      let unsubscribeSecond = () => {};

      channel.subscribe(() => unsubscribeSecond());
      unsubscribeSecond = channel.subscribe((record) => seen.push(record.newValue));

      channel.emit(createChangeRecord(1n, 0n, "Increased"));
      channel.emit(createChangeRecord(2n, 0n, "Increased"));

      expect(seen).toEqual([1n]);
    });
  });
});

describe("serializeRecord", () => {
  it("should write integers as decimal strings", () => {
    const record = createChangeRecord(7n, 1000n, "Decreased");
    expect(serializeRecord(record)).toBe('{"newValue":"7","timestamp":"1000","direction":"Decreased"}');
  });
});
