/**
 * Random register value generation and mutation.
 *
 * Values are built field-aware where it helps: an ESR with a chosen
 * Exception Class and clear RES0 bits reaches the ISS decoders far more
 * often than a uniformly random 64-bit value would.
 */

/** PRNG with seedable state for reproducible fuzzing. */
export class Rng {
  private state: number;

  constructor(seed: number) {
    // xorshift32 never leaves the all-zero state
    this.state = seed === 0 ? 0x9e3779b9 : seed;
  }

  /** Returns an unsigned 32-bit integer. */
  uint32(): number {
    // xorshift32
    this.state ^= this.state << 13;
    this.state ^= this.state >> 17;
    this.state ^= this.state << 5;
    return this.state >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    return this.uint32() / 0x100000000;
  }

  /** Returns an integer in [min, max] inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** Returns a random element from an array. */
  pick<T>(arr: readonly T[]): T {
    return arr[this.int(0, arr.length - 1)];
  }

  /** Returns true with the given probability. */
  chance(p: number): boolean {
    return this.next() < p;
  }

  /** Returns a uniformly random value of `bits` bits (at most 64). */
  bits(bits: number): bigint {
    const value = (BigInt(this.uint32()) << 32n) | BigInt(this.uint32());
    return bits >= 64 ? value : value & ((1n << BigInt(bits)) - 1n);
  }
}

/** Replace bits [start, end) of `value` with `field`. */
export function setField(value: bigint, start: number, end: number, field: bigint): bigint {
  const mask = ((1n << BigInt(end - start)) - 1n) << BigInt(start);
  return (value & ~mask) | ((field << BigInt(start)) & mask);
}

/**
 * An ESR value with the given Exception Class, random ISS2/IL/ISS and
 * RES0[37..64] clear.
 */
export function generateEsr(rng: Rng, ec: number): bigint {
  const low = rng.bits(26);
  const iss2 = rng.bits(5);
  return (iss2 << 32n) | (BigInt(ec) << 26n) | low;
}

/** A MIDR value with clear upper half. */
export function generateMidr(rng: Rng): bigint {
  return rng.bits(32);
}

/** An SMCCC function ID, occasionally with stray upper bits. */
export function generateSmccc(rng: Rng): bigint {
  return rng.chance(0.1) ? rng.bits(64) : rng.bits(32);
}

// -- Mutations --

/** A mutation function that transforms a register value. */
export type Mutator = (value: bigint, rng: Rng) => bigint;

/** Flip one random bit. */
export function bitFlip(value: bigint, rng: Rng): bigint {
  return value ^ (1n << BigInt(rng.int(0, 63)));
}

/** Overwrite a random 6-bit window, the width of EC and of the fault status codes. */
export function fieldReplace(value: bigint, rng: Rng): bigint {
  const start = rng.int(0, 58);
  return setField(value, start, start + 6, rng.bits(6));
}

/** Clear a random range of bits. */
export function rangeClear(value: bigint, rng: Rng): bigint {
  const start = rng.int(0, 63);
  const end = rng.int(start + 1, 64);
  return setField(value, start, end, 0n);
}

/** Set the fault status code to Synchronous External abort, which enables SET. */
export function externalAbort(value: bigint): bigint {
  return setField(value, 0, 6, 0b010000n);
}

export const MUTATORS: readonly Mutator[] = [bitFlip, fieldReplace, rangeClear, externalAbort];

/** Apply `count` random mutations. */
export function mutate(value: bigint, rng: Rng, count: number): bigint {
  let result = value;
  for (let i = 0; i < count; i++) {
    result = rng.pick(MUTATORS)(result, rng);
  }
  return result;
}
