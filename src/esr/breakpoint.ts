import { DecodeError } from '../DecodeError';
import { FieldInfo } from '../FieldInfo';

const FSC_DEBUG_EXCEPTION = 0b100010n;

/** Decodes the ISS of a Breakpoint or Vector Catch debug exception. */
export function decodeIssBreakpointVectorCatch(iss: bigint): FieldInfo[] {
  const res0 = FieldInfo.get(iss, 'RES0', 'Reserved', 6, 25).checkRes0();
  const ifsc = getIfsc(iss);

  return [res0, ifsc];
}

/** Decodes the ISS of a Software Step exception. */
export function decodeIssSoftwareStep(iss: bigint): FieldInfo[] {
  const isv = FieldInfo.getBit(iss, 'ISV', 'Instruction Syndrome Valid', 24)
    .describeBit(valid => (valid ? 'EX bit is valid' : 'EX bit is RES0'));
  const res0 = FieldInfo.get(iss, 'RES0', 'Reserved', 7, 24).checkRes0();
  const ex = isv.asBit()
    ? FieldInfo.getBit(iss, 'EX', 'Exclusive operation', 6).describeBit(describeEx)
    : FieldInfo.getBit(iss, 'RES0', 'Reserved because ISV is false', 6).checkRes0();
  const ifsc = getIfsc(iss);

  return [isv, res0, ex, ifsc];
}

/** Decodes the ISS of a Watchpoint exception. */
export function decodeIssWatchpoint(iss: bigint): FieldInfo[] {
  const res0a = FieldInfo.get(iss, 'RES0', 'Reserved', 15, 25).checkRes0();
  const res0b = FieldInfo.getBit(iss, 'RES0', 'Reserved', 14).checkRes0();
  const vncr = FieldInfo.getBit(iss, 'VNCR', undefined, 13);
  const res0c = FieldInfo.get(iss, 'RES0', 'Reserved', 9, 13).checkRes0();
  const cm = FieldInfo.getBit(iss, 'CM', 'Cache Maintenance', 8);
  const res0d = FieldInfo.getBit(iss, 'RES0', 'Reserved', 7).checkRes0();
  const wnr = FieldInfo.getBit(iss, 'WnR', 'Write not Read', 6).describeBit(describeWnr);
  const dfsc = FieldInfo.get(iss, 'DFSC', 'Data Fault Status Code', 0, 6).describe(describeFsc);

  return [res0a, res0b, vncr, res0c, cm, res0d, wnr, dfsc];
}

/** Decodes the ISS of a BKPT or BRK instruction execution. */
export function decodeIssBreakpoint(iss: bigint): FieldInfo[] {
  const res0 = FieldInfo.get(iss, 'RES0', 'Reserved', 16, 25).checkRes0();
  const comment = FieldInfo.get(
    iss, 'Comment', 'Instruction comment field or immediate field', 0, 16,
  );

  return [res0, comment];
}

function getIfsc(iss: bigint): FieldInfo {
  return FieldInfo.get(iss, 'IFSC', 'Instruction Fault Status Code', 0, 6).describe(describeFsc);
}

function describeFsc(fsc: bigint): string {
  if (fsc !== FSC_DEBUG_EXCEPTION) {
    throw new DecodeError({ kind: 'InvalidFsc', fsc });
  }
  return 'Debug exception';
}

function describeEx(ex: boolean): string {
  return ex
    ? 'A Load-Exclusive instruction was stepped'
    : 'Some instruction other than a Load-Exclusive was stepped';
}

function describeWnr(wnr: boolean): string {
  return wnr
    ? 'Watchpoint caused by writing to memory'
    : 'Watchpoint caused by reading from memory';
}
