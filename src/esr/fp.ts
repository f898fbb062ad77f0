import { FieldInfo } from '../FieldInfo';

/** Decodes the ISS of a trapped floating-point exception. */
export function decodeIssFp(iss: bigint): FieldInfo[] {
  const res0a = FieldInfo.getBit(iss, 'RES0', 'Reserved', 24).checkRes0();
  const tfv = FieldInfo.getBit(iss, 'TFV', 'Trapped Fault Valid', 23).describeBit(describeTfv);
  const res0b = FieldInfo.get(iss, 'RES0', 'Reserved', 11, 23).checkRes0();
  const vecitr = FieldInfo.get(iss, 'VECITR', 'RES1 or UNKNOWN', 8, 11);
  const idf = exceptionFlag(iss, 'IDF', 'Input Denormal', 7, 'Input denormal');
  const res0c = FieldInfo.get(iss, 'RES0', 'Reserved', 5, 7).checkRes0();
  const ixf = exceptionFlag(iss, 'IXF', 'Inexact', 4, 'Inexact');
  const uff = exceptionFlag(iss, 'UFF', 'Underflow', 3, 'Underflow');
  const off = exceptionFlag(iss, 'OFF', 'Overflow', 2, 'Overflow');
  const dzf = exceptionFlag(iss, 'DZF', 'Divide by Zero', 1, 'Divide by Zero');
  const iof = exceptionFlag(iss, 'IOF', 'Invalid Operation', 0, 'Invalid Operation');

  return [res0a, tfv, res0b, vecitr, idf, res0c, ixf, uff, off, dzf, iof];
}

function describeTfv(tfv: boolean): string {
  return tfv
    ? 'One or more floating-point exceptions occurred; IDF, IXF, UFF, OFF, DZF and IOF hold information about what.'
    : 'IDF, IXF, UFF, OFF, DZF and IOF do not hold valid information.';
}

function exceptionFlag(
  iss: bigint, name: string, longName: string, bit: number, exception: string,
): FieldInfo {
  return FieldInfo.getBit(iss, name, longName, bit).describeBit(occurred =>
    occurred
      ? `${exception} floating-point exception occurred.`
      : `${exception} floating-point exception did not occur.`,
  );
}
