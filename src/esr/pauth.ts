import { FieldInfo } from '../FieldInfo';

/** Decodes the ISS of a Pointer Authentication failure. */
export function decodeIssPauth(iss: bigint): FieldInfo[] {
  const res0 = FieldInfo.get(iss, 'RES0', 'Reserved', 2, 25).checkRes0();
  const instructionOrData = FieldInfo.getBit(iss, 'IorD', 'Instruction key or Data key', 1)
    .describeBit(iorD => (iorD ? 'Data Key' : 'Instruction Key'));
  const aOrB = FieldInfo.getBit(iss, 'AorB', 'A key or B key', 0)
    .describeBit(aorB => (aorB ? 'B Key' : 'A Key'));

  return [res0, instructionOrData, aOrB];
}
