import { toRegister } from '../BitField';
import { FieldInfo } from '../FieldInfo';

const IMPLEMENTERS: ReadonlyMap<bigint, string> = new Map([
  [0x00n, 'Reserved for software use'],
  [0xc0n, 'Ampere Computing'],
  [0x41n, 'Arm Limited'],
  [0x42n, 'Broadcom Corporation'],
  [0x43n, 'Cavium Inc.'],
  [0x44n, 'Digital Equipment Corporation'],
  [0x46n, 'Fujitsu Ltd.'],
  [0x49n, 'Infineon Technologies AG'],
  [0x4dn, 'Motorola or Freescale Semiconductor Inc.'],
  [0x4en, 'NVIDIA Corporation'],
  [0x50n, 'Applied Micro Circuits Corporation'],
  [0x51n, 'Qualcomm Inc.'],
  [0x56n, 'Marvell International Ltd.'],
  [0x69n, 'Intel Corporation'],
]);

const ARCHITECTURES: ReadonlyMap<bigint, string> = new Map([
  [0b0001n, 'Armv4'],
  [0b0010n, 'Armv4T'],
  [0b0011n, 'Armv5'],
  [0b0100n, 'Armv5T'],
  [0b0101n, 'Armv5TE'],
  [0b0110n, 'Armv5TEJ'],
  [0b0111n, 'Armv6'],
  [0b1111n, 'Architectural features are individually identified'],
]);

export function describeImplementer(implementer: bigint): string {
  return IMPLEMENTERS.get(implementer) ?? 'Unknown';
}

export function describeArchitecture(architecture: bigint): string {
  return ARCHITECTURES.get(architecture) ?? 'Reserved';
}

/**
 * Decodes a Main ID Register value.
 * Only the upper 32 bits can make it invalid; every implementer and
 * architecture code gets some description.
 */
export function decodeMidr(value: bigint | number): FieldInfo[] {
  const midr = toRegister(value);
  const res0 = FieldInfo.get(midr, 'RES0', 'Reserved', 32, 64).checkRes0();
  const implementer = FieldInfo.get(midr, 'Implementer', undefined, 24, 32).describe(describeImplementer);
  const variant = FieldInfo.get(midr, 'Variant', undefined, 20, 24);
  const architecture = FieldInfo.get(midr, 'Architecture', undefined, 16, 20).describe(describeArchitecture);
  const partNum = FieldInfo.get(midr, 'PartNum', 'Part number', 4, 16);
  const revision = FieldInfo.get(midr, 'Revision', undefined, 0, 4);

  return [res0, implementer, variant, architecture, partNum, revision];
}
