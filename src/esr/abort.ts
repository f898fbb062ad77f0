import { FieldInfo } from '../FieldInfo';
import { describeFsc, describeSet, FSC_SYNCHRONOUS_EXTERNAL_ABORT } from './faultStatus';

/** Decodes the ISS of an Instruction Abort. */
export function decodeIssInstructionAbort(iss: bigint): FieldInfo[] {
  const res0a = FieldInfo.get(iss, 'RES0', 'Reserved', 13, 25).checkRes0();
  const fnv = FieldInfo.getBit(iss, 'FnV', 'FAR not Valid', 10).describeBit(describeFnv);
  const ea = FieldInfo.getBit(iss, 'EA', 'External abort type', 9);
  const res0b = FieldInfo.getBit(iss, 'RES0', 'Reserved', 8).checkRes0();
  const s1ptw = FieldInfo.getBit(iss, 'S1PTW', 'Stage-1 translation table walk', 7);
  const res0c = FieldInfo.getBit(iss, 'RES0', 'Reserved', 6).checkRes0();
  const ifsc = FieldInfo.get(iss, 'IFSC', 'Instruction Fault Status Code', 0, 6)
    .describe(describeFsc);
  const set = getSyncErrorType(iss, ifsc);

  return [res0a, set, fnv, ea, res0b, s1ptw, res0c, ifsc];
}

/** Decodes the ISS of a Data Abort. */
export function decodeIssDataAbort(iss: bigint): FieldInfo[] {
  const isv = FieldInfo.getBit(iss, 'ISV', 'Instruction Syndrome Valid', 24)
    .describeBit(describeIsv);

  let instructionSyndrome: FieldInfo[];
  if (isv.asBit()) {
    // Only meaningful when the syndrome is valid.
    const sas = FieldInfo.get(iss, 'SAS', 'Syndrome Access Size', 22, 24).describe(describeSas);
    const sse = FieldInfo.getBit(iss, 'SSE', 'Syndrome Sign Extend', 21);
    const srt = FieldInfo.get(iss, 'SRT', 'Syndrome Register Transfer', 16, 21);
    const sf = FieldInfo.getBit(iss, 'SF', 'Sixty-Four', 15).describeBit(describeSf);
    const ar = FieldInfo.getBit(iss, 'AR', 'Acquire/Release', 14).describeBit(describeAr);
    instructionSyndrome = [sas, sse, srt, sf, ar];
  } else {
    instructionSyndrome = [FieldInfo.get(iss, 'RES0', 'Reserved', 14, 24).checkRes0()];
  }

  const vncr = FieldInfo.getBit(iss, 'VNCR', undefined, 13);
  const fnv = FieldInfo.getBit(iss, 'FnV', 'FAR not Valid', 10).describeBit(describeFnv);
  const ea = FieldInfo.getBit(iss, 'EA', 'External abort type', 9);
  const cm = FieldInfo.getBit(iss, 'CM', 'Cache Maintenance', 8);
  const s1ptw = FieldInfo.getBit(iss, 'S1PTW', 'Stage-1 translation table walk', 7);
  const wnr = FieldInfo.getBit(iss, 'WnR', 'Write not Read', 6).describeBit(describeWnr);
  const dfsc = FieldInfo.get(iss, 'DFSC', 'Data Fault Status Code', 0, 6).describe(describeFsc);
  const set = getSyncErrorType(iss, dfsc);

  return [isv, ...instructionSyndrome, vncr, set, fnv, ea, cm, s1ptw, wnr, dfsc];
}

/**
 * SET is only defined for synchronous External aborts. For other fault
 * codes the bits are reported as RES0 but not checked.
 */
function getSyncErrorType(iss: bigint, fsc: FieldInfo): FieldInfo {
  if (fsc.value === FSC_SYNCHRONOUS_EXTERNAL_ABORT) {
    return FieldInfo.get(iss, 'SET', 'Synchronous Error Type', 11, 13).describe(describeSet);
  }
  return FieldInfo.get(iss, 'RES0', 'Reserved', 11, 13);
}

const ACCESS_SIZES = ['byte', 'halfword', 'word', 'doubleword'] as const;

function describeSas(sas: bigint): string {
  return ACCESS_SIZES[Number(sas)];
}

function describeIsv(isv: boolean): string {
  return isv ? 'Valid instruction syndrome' : 'No valid instruction syndrome';
}

function describeSf(sf: boolean): string {
  return sf ? '64-bit wide register' : '32-bit wide register';
}

function describeAr(ar: boolean): string {
  return ar ? 'Acquire/release semantics' : 'No acquire/release semantics';
}

function describeFnv(fnv: boolean): string {
  return fnv ? 'FAR is not valid, it holds an unknown value' : 'FAR is valid';
}

function describeWnr(wnr: boolean): string {
  return wnr ? 'Abort caused by writing to memory' : 'Abort caused by reading from memory';
}
