import { describe, it, expect } from "vitest";
import { concat, encodeErrorResult, parseAbi, slice, toFunctionSelector } from "viem";
import {
  CounterError,
  OverflowError,
  UnderflowError,
  decodeCounterError,
  isCounterError,
} from "../../src/errors.js";

const errorAbi = parseAbi([
  "error Overflow(uint256 current, uint256 amount)",
  "error Underflow(uint256 current, uint256 amount)",
]);

describe("Counter errors", () => {
  describe("identity", () => {
    it("should name and tag each kind", () => {
      const overflow = new OverflowError(10n, 1n);
      const underflow = new UnderflowError(0n, 1n);

      expect(overflow.name).toBe("OverflowError");
      expect(overflow.kind).toBe("Overflow");
      expect(overflow.message).toBe("Overflow: cannot increase 10 by 1");
      expect(underflow.name).toBe("UnderflowError");
      expect(underflow.kind).toBe("Underflow");
      expect(underflow.message).toBe("Underflow: cannot decrease 0 by 1");
    });

    it("should be Error and CounterError instances", () => {
      const err = new UnderflowError(0n, 1n);
      expect(err).toBeInstanceOf(Error);
      expect(err).toBeInstanceOf(CounterError);
      expect(isCounterError(err)).toBe(true);
    });

    it("should not match other errors", () => {
      expect(isCounterError(new RangeError("value -1 is not a valid uint256"))).toBe(false);
      expect(isCounterError("Overflow")).toBe(false);
    });
  });

  describe("revert data", () => {
    it("should use the custom error selectors", () => {
      expect(new OverflowError(0n, 0n).selector).toBe(
        toFunctionSelector("Overflow(uint256,uint256)")
      );
      expect(new UnderflowError(0n, 0n).selector).toBe(
        toFunctionSelector("Underflow(uint256,uint256)")
      );
    });

    it("should encode like a Solidity custom error", () => {
      expect(new OverflowError(5n, 1n).data).toBe(
        encodeErrorResult({ abi: errorAbi, errorName: "Overflow", args: [5n, 1n] })
      );
      expect(new UnderflowError(3n, 5n).data).toBe(
        encodeErrorResult({ abi: errorAbi, errorName: "Underflow", args: [3n, 5n] })
      );
    });

    it("should decode back into the same error", () => {
      const decoded = decodeCounterError(new UnderflowError(3n, 5n).data);
      expect(decoded).toBeInstanceOf(UnderflowError);
      expect(decoded).toMatchObject({ kind: "Underflow", current: 3n, amount: 5n });
    });

    it("should decode an overflow", () => {
      const decoded = decodeCounterError(new OverflowError(255n, 1n).data);
      expect(decoded).toBeInstanceOf(OverflowError);
      expect(decoded?.message).toBe("Overflow: cannot increase 255 by 1");
    });

    it("should return null for foreign revert data", () => {
      expect(decodeCounterError("0x")).toBeNull();
      expect(decodeCounterError("0x1234")).toBeNull();
      expect(decodeCounterError("0xdeadbeef")).toBeNull();
    });

    it("should return null for a bare selector", () => {
      expect(decodeCounterError(new OverflowError(0n, 0n).selector)).toBeNull();
    });

    it("should return null for truncated or padded arguments", () => {
      const data = new UnderflowError(3n, 5n).data;
      expect(decodeCounterError(slice(data, 0, 40))).toBeNull();
      expect(decodeCounterError(concat([data, "0x00"]))).toBeNull();
    });
  });
});
