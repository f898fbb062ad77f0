import { FieldInfo } from '../FieldInfo';

/** Describes a 16-bit function number within one service namespace. */
export type FunctionDescriber = (functionNumber: bigint) => string | undefined;

/** Call Convention bit: 0 for SMC32/HVC32, 1 for SMC64/HVC64. */
export const SMC32 = 0n;

export function functionNumberField(fid: bigint, describer: FunctionDescriber): FieldInfo {
  return FieldInfo.get(fid, 'Function Number', undefined, 0, 16).describe(describer);
}

/** Picks the 32- or 64-bit table of a service from the Call Convention bit. */
export function byConvention(
  fid: bigint,
  convention: bigint,
  describe32: FunctionDescriber,
  describe64: FunctionDescriber,
): FieldInfo {
  return functionNumberField(fid, convention === SMC32 ? describe32 : describe64);
}

export function reservedFunctionIds(functionNumber: bigint): string | undefined {
  if (functionNumber >= 0xff00n && functionNumber <= 0xffffn) {
    return 'Reserved for future expansion';
  }
  return undefined;
}

export function generalQueries32(functionNumber: bigint): string | undefined {
  switch (functionNumber) {
    case 0xff00n:
      return 'Call Count Query, deprecated from SMCCCv1.2';
    case 0xff01n:
      return 'Call UUID Query';
    case 0xff03n:
      return 'Revision Query';
    default:
      return reservedFunctionIds(functionNumber);
  }
}

/** Services with no table of their own: CPU, SiP, OEM, vendor hypervisor, trusted OS. */
export function decodeCommonService(fid: bigint, convention: bigint): FieldInfo {
  return byConvention(fid, convention, generalQueries32, reservedFunctionIds);
}
