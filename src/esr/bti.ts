import { FieldInfo } from '../FieldInfo';

/** Decodes the ISS of a Branch Target Exception. */
export function decodeIssBti(iss: bigint): FieldInfo[] {
  const res0 = FieldInfo.get(iss, 'RES0', 'Reserved', 2, 25).checkRes0();
  const btype = FieldInfo.get(iss, 'BTYPE', 'PSTATE.BTYPE value', 0, 2);

  return [res0, btype];
}
