import { DecodeError } from '../DecodeError';
import { FieldInfo } from '../FieldInfo';
import { decodeCondition } from './common';

/** Decodes the ISS of a trapped LDC or STC access. */
export function decodeIssLdc(iss: bigint): FieldInfo[] {
  const [cv, cond] = decodeCondition(iss);
  const imm8 = FieldInfo.get(iss, 'imm8', 'Immediate value of the trapped instruction', 12, 20);
  const res0 = FieldInfo.get(iss, 'RES0', 'Reserved', 10, 12).checkRes0();
  const rn = FieldInfo.get(
    iss, 'Rn', 'General-purpose register number of the trapped instruction', 5, 10,
  );
  const offset = FieldInfo.getBit(iss, 'Offset', 'Whether the offset is added or subtracted', 4)
    .describeBit(describeOffset);
  const am = FieldInfo.get(iss, 'AM', 'Addressing Mode', 1, 4).describe(describeAm);
  const direction = FieldInfo.getBit(iss, 'Direction', 'Direction of the trapped instruction', 0)
    .describeBit(describeDirection);

  return [cv, cond, imm8, res0, rn, offset, am, direction];
}

function describeOffset(offset: boolean): string {
  return offset ? 'Add offset' : 'Subtract offset';
}

function describeAm(am: bigint): string {
  switch (am) {
    case 0b000n: return 'Immediate unindexed';
    case 0b001n: return 'Immediate post-indexed';
    case 0b010n: return 'Immediate offset';
    case 0b011n: return 'Immediate pre-indexed';
    case 0b100n: return 'Reserved for trapped STR or T32 LDC';
    case 0b110n: return 'Reserved for trapped STC';
    default:
      throw new DecodeError({ kind: 'InvalidAm', am });
  }
}

function describeDirection(direction: boolean): string {
  return direction ? 'Read from memory (LDC)' : 'Write to memory (STC)';
}
