/**
 * bounded-counter runtime types
 * EVM-style integer widths and the event interface shared by the counter and its hosts.
 */

// Integer Types
export type UintBitSize =
  | 8
  | 16
  | 24
  | 32
  | 40
  | 48
  | 56
  | 64
  | 72
  | 80
  | 88
  | 96
  | 104
  | 112
  | 120
  | 128
  | 136
  | 144
  | 152
  | 160
  | 168
  | 176
  | 184
  | 192
  | 200
  | 208
  | 216
  | 224
  | 232
  | 240
  | 248
  | 256;

/**
 * Unsigned integer with N bits. The width documents intent only;
 * assertUint enforces it at run time.
 */
export type Uint<_N extends UintBitSize> = bigint;

export type u256 = Uint<256>;

export function isUintBitSize(bits: number): bits is UintBitSize {
  return Number.isInteger(bits) && bits >= 8 && bits <= 256 && bits % 8 === 0;
}

/** Largest value representable in an unsigned integer of the given width */
export function maxUint(bits: UintBitSize): bigint {
  return (1n << BigInt(bits)) - 1n;
}

/** Solidity type name for an unsigned width, e.g. 64 -> "uint64" */
export function uintType(bits: UintBitSize): string {
  return `uint${bits}`;
}

// Constants
export const MAX_U256: u256 = maxUint(256);

// Event Types
export interface Event<T> {
  emit(data: T): void;
}

// Value checks

const UINT_LITERAL = /^(0x[0-9a-fA-F]+|[0-9]+)$/;

/** True for a decimal or 0x-prefixed hex unsigned integer literal */
export function isUintLiteral(text: string): boolean {
  return UINT_LITERAL.test(text);
}

/**
 * Throws a RangeError unless value fits an unsigned integer of the given width.
 */
export function assertUint(value: bigint, bits: UintBitSize, label = "value"): void {
  if (value < 0n || value > maxUint(bits)) {
    throw new RangeError(`${label} ${value} is not a valid ${uintType(bits)}`);
  }
}
