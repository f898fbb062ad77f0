/**
 * Structural checks every successful decode must pass, shared by the
 * fuzz tests and the standalone fuzzer.
 */

import { extractBits } from '../src/BitField';
import type { FieldInfo } from '../src/FieldInfo';

/**
 * Check that every field's value is exactly the bits it claims within its
 * parent, that fields fit their parent and that siblings don't overlap.
 * Returns a description of the first violation, or undefined.
 */
export function checkBitAccounting(
  fields: readonly FieldInfo[],
  parentValue: bigint,
  parentWidth: number,
  path = '',
): string | undefined {
  let claimed = 0n;
  for (const field of fields) {
    const where = `${path}${field.name}`;
    const end = field.start + field.width;
    if (field.width < 1 || end > parentWidth) {
      return `${where} [${field.start}, ${end}) does not fit in ${parentWidth} bits`;
    }
    const expected = extractBits(parentValue, field.start, end);
    if (field.value !== expected) {
      return `${where} is 0x${field.value.toString(16)}, bits hold 0x${expected.toString(16)}`;
    }
    const mask = ((1n << BigInt(field.width)) - 1n) << BigInt(field.start);
    if ((claimed & mask) !== 0n) {
      return `${where} overlaps a sibling`;
    }
    claimed |= mask;
    const nested = checkBitAccounting(field.subfields, field.value, field.width, `${where}.`);
    if (nested !== undefined) return nested;
  }
  return undefined;
}
