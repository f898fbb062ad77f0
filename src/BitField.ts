/**
 * Bit-range helpers over 64-bit register values.
 * Registers are held as bigint so all 64 bits survive; bit 0 is the LSB.
 */

/** Largest value a 64-bit register can hold. */
export const REGISTER_MAX = (1n << 64n) - 1n;

/**
 * Extract bits [start, end) of a register, shifted down to bit 0.
 * The range comes from fixed per-field constants, so a bad range is a
 * programming error rather than a data error.
 */
export function extractBits(value: bigint, start: number, end: number): bigint {
  if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end > 64 || start >= end) {
    throw new Error(`Invalid bit range [${start}, ${end})`);
  }
  const mask = (1n << BigInt(end - start)) - 1n;
  return (value >> BigInt(start)) & mask;
}

/** Extract a single bit as a boolean. */
export function extractBit(value: bigint, bit: number): boolean {
  return extractBits(value, bit, bit + 1) === 1n;
}

/**
 * Normalise a register value. Numbers must be non-negative safe integers;
 * anything outside [0, 2^64) is rejected.
 */
export function toRegister(value: bigint | number): bigint {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`Register value must be a non-negative safe integer, got ${value}`);
    }
    return BigInt(value);
  }
  if (value < 0n || value > REGISTER_MAX) {
    throw new RangeError(`Register value 0x${value.toString(16)} does not fit in 64 bits`);
  }
  return value;
}

/**
 * Parse a register value typed by a user: "0x" prefix for hexadecimal,
 * decimal otherwise.
 */
export function parseNumber(text: string): bigint {
  const trimmed = text.trim();
  let value: bigint;
  if (/^0[xX][0-9a-fA-F]+$/.test(trimmed)) {
    value = BigInt(trimmed.toLowerCase());
  } else if (/^[0-9]+$/.test(trimmed)) {
    value = BigInt(trimmed);
  } else {
    throw new Error(`Invalid number: '${text}'`);
  }
  if (value > REGISTER_MAX) {
    throw new Error(`Number ${text} does not fit in 64 bits`);
  }
  return value;
}
