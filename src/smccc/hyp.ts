import { byConvention, generalQueries32 } from './common';
import type { FieldInfo } from '../FieldInfo';

function describeHyp64(functionNumber: bigint): string | undefined {
  if (functionNumber >= 0x20n && functionNumber <= 0x3fn) {
    return 'PV Time 64-bit calls';
  }
  return undefined;
}

/** Standard Hypervisor Service Calls (service 0x05). */
export function decodeHypService(fid: bigint, convention: bigint): FieldInfo {
  return byConvention(fid, convention, generalQueries32, describeHyp64);
}
