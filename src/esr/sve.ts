import { FieldInfo } from '../FieldInfo';
import { decodeCondition } from './common';

/** Decodes the ISS of a trapped SVE, Advanced SIMD or floating-point access. */
export function decodeIssSve(iss: bigint): FieldInfo[] {
  const [cv, cond] = decodeCondition(iss);
  const res0 = FieldInfo.get(iss, 'RES0', 'Reserved', 0, 20).checkRes0();

  return [cv, cond, res0];
}
