import { DecodeError } from '../DecodeError';
import { FieldInfo } from '../FieldInfo';

/** Decodes the ISS of a trapped LD64B, ST64B, ST64BV or ST64BV0. */
export function decodeIssLd64b(iss: bigint): FieldInfo[] {
  return [FieldInfo.get(iss, 'ISS', undefined, 0, 25).describe(describeIssLd64b)];
}

function describeIssLd64b(iss: bigint): string {
  switch (iss) {
    case 0b00n: return 'ST64BV trapped';
    case 0b01n: return 'ST64BV0 trapped';
    case 0b10n: return 'LD64B or ST64B trapped';
    default:
      throw new DecodeError({ kind: 'InvalidLd64bIss', iss });
  }
}
