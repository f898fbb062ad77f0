import { FieldInfo } from '../FieldInfo';

/** ISS layout shared by the classes whose syndrome carries no information. */
export function decodeIssRes0(iss: bigint): FieldInfo[] {
  const res0 = FieldInfo.get(iss, 'RES0', 'Reserved', 0, 25)
    .checkRes0()
    .withDescription('ISS is RES0');
  return [res0];
}

export function describeCv(cv: boolean): string {
  return cv ? 'COND is valid' : 'COND is not valid';
}

/** CV and COND, the leading fields of the AArch32 trap syndromes. */
export function decodeCondition(iss: bigint): [FieldInfo, FieldInfo] {
  const cv = FieldInfo.getBit(iss, 'CV', 'Condition code valid', 24).describeBit(describeCv);
  const cond = FieldInfo.get(iss, 'COND', 'Condition code of the trapped instruction', 20, 24);
  return [cv, cond];
}
