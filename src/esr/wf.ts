import { FieldInfo } from '../FieldInfo';
import { decodeCondition } from './common';

/** Decodes the ISS of a trapped WFI, WFE, WFIT or WFET. */
export function decodeIssWf(iss: bigint): FieldInfo[] {
  const [cv, cond] = decodeCondition(iss);
  const res0a = FieldInfo.get(iss, 'RES0', 'Reserved', 10, 20).checkRes0();
  const rn = FieldInfo.get(iss, 'RN', 'Register Number', 5, 10);
  const res0b = FieldInfo.get(iss, 'RES0', 'Reserved', 3, 5).checkRes0();
  const rv = FieldInfo.getBit(iss, 'RV', 'Register Valid', 2).describeBit(describeRv);
  const ti = FieldInfo.get(iss, 'TI', 'Trapped Instruction', 0, 2).describe(describeTi);

  return [cv, cond, res0a, rn, res0b, rv, ti];
}

function describeRv(rv: boolean): string {
  return rv ? 'RN is valid' : 'RN is not valid';
}

const TRAPPED_INSTRUCTIONS = ['WFI trapped', 'WFE trapped', 'WFIT trapped', 'WFET trapped'] as const;

function describeTi(ti: bigint): string {
  return TRAPPED_INSTRUCTIONS[Number(ti)];
}
