import { FieldInfo } from '../FieldInfo';
import { sysregName } from '../sysregs/sysregNames';

/** Fields of a trapped MSR/MRS, plus the reconstructed instruction. */
export interface MsrDecode {
  fields: FieldInfo[];
  /** Disassembly-like form, e.g. "MRS x3, MIDR_EL1". */
  instruction: string;
}

/** Decodes the ISS of a trapped MSR, MRS or System instruction. */
export function decodeIssMsr(iss: bigint): MsrDecode {
  const res0 = FieldInfo.get(iss, 'RES0', 'Reserved', 22, 25).checkRes0();
  const op0 = FieldInfo.get(iss, 'Op0', undefined, 20, 22);
  const op2 = FieldInfo.get(iss, 'Op2', undefined, 17, 20);
  const op1 = FieldInfo.get(iss, 'Op1', undefined, 14, 17);
  const crn = FieldInfo.get(iss, 'CRn', undefined, 10, 14);
  const rt = FieldInfo.get(
    iss, 'Rt', 'General-purpose register number of the trapped instruction', 5, 10,
  );
  const crm = FieldInfo.get(iss, 'CRm', undefined, 1, 5);
  const direction = FieldInfo.getBit(iss, 'Direction', 'Direction of the trapped instruction', 0)
    .describeBit(describeDirection);

  const name = sysregName({
    op0: Number(op0.value),
    op1: Number(op1.value),
    crn: Number(crn.value),
    crm: Number(crm.value),
    op2: Number(op2.value),
  }) ?? 'unknown';
  const instruction = direction.asBit()
    ? `MRS x${rt.value}, ${name}`
    : `MSR ${name}, x${rt.value}`;

  return {
    fields: [res0, op0, op2, op1, crn, rt, crm, direction],
    instruction,
  };
}

function describeDirection(direction: boolean): string {
  return direction
    ? 'Read from system register (MRS)'
    : 'Write to system register (MSR)';
}
