import { byConvention, generalQueries32 } from './common';
import { ffa32FunctionName, ffa64FunctionName } from './ffa';
import type { FieldInfo } from '../FieldInfo';

interface FunctionRange {
  first: bigint;
  last: bigint;
  description: string;
}

const SECURE_RANGES: readonly FunctionRange[] = [
  { first: 0x000n, last: 0x01fn, description: 'PSCI Call (Power Secure Control Interface)' },
  { first: 0x020n, last: 0x03fn, description: 'SDEI Call (Software Delegated Exception Interface)' },
  { first: 0x040n, last: 0x04fn, description: 'MM Call (Management Mode)' },
  { first: 0x050n, last: 0x05fn, description: 'TRNG Call' },
  { first: 0x060n, last: 0x0efn, description: 'Unknown FF-A Call' },
  { first: 0x0f0n, last: 0x10fn, description: 'Errata Call' },
  { first: 0x150n, last: 0x1cfn, description: 'CCA Call' },
];

/** Last function number of the ranges owned by secure-world interfaces. */
const SECURE_RANGES_END = 0x1cfn;

function secureRange(functionNumber: bigint): string | undefined {
  return SECURE_RANGES.find(r => functionNumber >= r.first && functionNumber <= r.last)?.description;
}

function describeSecure32(functionNumber: bigint): string | undefined {
  const ffa = ffa32FunctionName(functionNumber);
  if (ffa !== undefined) return ffa;
  return functionNumber <= SECURE_RANGES_END
    ? secureRange(functionNumber)
    : generalQueries32(functionNumber);
}

function describeSecure64(functionNumber: bigint): string | undefined {
  return ffa64FunctionName(functionNumber) ?? secureRange(functionNumber);
}

/** Standard Secure Service Calls (service 0x04). */
export function decodeSecureService(fid: bigint, convention: bigint): FieldInfo {
  return byConvention(fid, convention, describeSecure32, describeSecure64);
}
