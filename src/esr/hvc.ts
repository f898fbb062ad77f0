import { FieldInfo } from '../FieldInfo';

/** Decodes the ISS of an SVC, HVC or SMC instruction execution. */
export function decodeIssHvc(iss: bigint): FieldInfo[] {
  const res0 = FieldInfo.get(iss, 'RES0', 'Reserved', 16, 25).checkRes0();
  const imm16 = FieldInfo.get(
    iss, 'imm16', 'Value of the immediate field from the HVC, SVC or SMC instruction', 0, 16,
  );

  return [res0, imm16];
}
