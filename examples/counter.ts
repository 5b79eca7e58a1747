import {
  Counter,
  decodeChangeLog,
  encodeChangeLog,
  isCounterError,
  logicalClock,
  serializeRecord,
  type EvmLog,
} from "../src/index.js";

/**
 * Counter with a log-indexer style subscriber
 *
 * Demonstrates:
 * - Subscribing to change records
 * - Encoding records as EVM logs and decoding them back
 * - Handling Overflow / Underflow
 */
const counter = new Counter({ bits: 8, clock: logicalClock() });
const logs: EvmLog[] = [];

counter.onChange((record) => logs.push(encodeChangeLog(record, counter.bits)));

counter.increaseByValue(10n);
counter.decreaseByValue(3n);
counter.set(2n);
counter.reset();

try {
  counter.decreaseByOne();
} catch (err) {
  if (!isCounterError(err)) throw err;
  console.log(`${err.kind} rejected, revert data ${err.data}`);
}

for (const log of logs) {
  const record = decodeChangeLog(log, counter.bits);
  if (record) console.log(serializeRecord(record));
}
