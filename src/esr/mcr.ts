import { FieldInfo } from '../FieldInfo';
import { decodeCondition } from './common';

/** Decodes the ISS of a trapped MCR or MRC access. */
export function decodeIssMcr(iss: bigint): FieldInfo[] {
  const [cv, cond] = decodeCondition(iss);
  const opc2 = FieldInfo.get(iss, 'Opc2', undefined, 17, 20);
  const opc1 = FieldInfo.get(iss, 'Opc1', undefined, 14, 17);
  const crn = FieldInfo.get(iss, 'CRn', undefined, 10, 14);
  const rt = FieldInfo.get(iss, 'Rt', undefined, 5, 10);
  const crm = FieldInfo.get(iss, 'CRm', undefined, 1, 5);
  const direction = getDirection(iss);

  return [cv, cond, opc2, opc1, crn, rt, crm, direction];
}

/** Decodes the ISS of a trapped MCRR or MRRC access. */
export function decodeIssMcrr(iss: bigint): FieldInfo[] {
  const [cv, cond] = decodeCondition(iss);
  const opc1 = FieldInfo.get(iss, 'Opc1', undefined, 16, 20);
  const res0 = FieldInfo.getBit(iss, 'RES0', 'Reserved', 15).checkRes0();
  const rt2 = FieldInfo.get(iss, 'Rt2', undefined, 10, 15);
  const rt = FieldInfo.get(iss, 'Rt', undefined, 5, 10);
  const crm = FieldInfo.get(iss, 'CRm', undefined, 1, 5);
  const direction = getDirection(iss);

  return [cv, cond, opc1, res0, rt2, rt, crm, direction];
}

function getDirection(iss: bigint): FieldInfo {
  return FieldInfo.getBit(iss, 'Direction', 'Direction of the trapped instruction', 0)
    .describeBit(describeDirection);
}

function describeDirection(direction: boolean): string {
  return direction
    ? 'Read from system register (MRC or VMRS)'
    : 'Write to system register (MCR)';
}
