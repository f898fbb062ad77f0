import { byConvention, reservedFunctionIds } from './common';
import type { FieldInfo } from '../FieldInfo';

const ARM_32_FUNCTIONS: ReadonlyMap<bigint, string> = new Map([
  [0x0000n, 'SMCCC_VERSION'],
  [0x0001n, 'SMCCC_ARCH_FEATURES'],
  [0x0002n, 'SMCCC_ARCH_SOC_ID'],
  [0x3fffn, 'SMCCC_ARCH_WORKAROUND_3'],
  [0x7fffn, 'SMCCC_ARCH_WORKAROUND_2'],
  [0x8000n, 'SMCCC_ARCH_WORKAROUND_1'],
  [0xff00n, 'Call Count Query, deprecated from SMCCCv1.2'],
  [0xff01n, 'Call UUID Query, deprecated from SMCCCv1.2'],
  [0xff03n, 'Revision Query, deprecated from SMCCCv1.2'],
]);

function describeArm32(functionNumber: bigint): string | undefined {
  return ARM_32_FUNCTIONS.get(functionNumber) ?? reservedFunctionIds(functionNumber);
}

/** Arm Architecture Calls (service 0x00). */
export function decodeArmService(fid: bigint, convention: bigint): FieldInfo {
  return byConvention(fid, convention, describeArm32, reservedFunctionIds);
}
