import { toRegister } from '../BitField';
import { FieldInfo } from '../FieldInfo';
import { decodeArmService } from './arm';
import { decodeCommonService } from './common';
import { decodeHypService } from './hyp';
import { decodeSecureService } from './secure';
import { decodeTappService } from './tapp';

/** Decodes the Function Number field of one service namespace. */
type ServiceDecoder = (fid: bigint, convention: bigint) => FieldInfo;

function describeCallType(callType: boolean): string {
  return callType ? 'Fast Call' : 'Yielding Call';
}

function describeConvention(convention: boolean): string {
  return convention ? 'SMC64/HVC64' : 'SMC32/HVC32';
}

export function describeService(service: bigint): string {
  if (service === 0x00n) return 'Arm Architecture Call';
  if (service === 0x01n) return 'CPU Service Call';
  if (service === 0x02n) return 'SiP Service Call';
  if (service === 0x03n) return 'OEM Service Call';
  if (service === 0x04n) return 'Standard Secure Service Call';
  if (service === 0x05n) return 'Standard Hypervisor Service Call';
  if (service === 0x06n) return 'Vendor Specific Hypervisor Service Call';
  if (service <= 0x2fn) return 'Reserved for future use';
  if (service <= 0x31n) return 'Trusted Application Call';
  return 'Trusted OS Call';
}

export function describeYieldService(service: bigint): string {
  if (service <= 0x0100ffffn) {
    return 'Reserved for existing APIs (in use by the existing Armv7 devices)';
  }
  if (service >= 0x02000000n && service <= 0x1fffffffn) return 'Trusted OS Yielding Calls';
  if (service >= 0x20000000n && service <= 0x7fffffffn) {
    return 'Reserved for future expansion of Trusted OS Yielding Calls';
  }
  return 'Unknown';
}

function serviceDecoder(service: bigint): ServiceDecoder {
  if (service === 0x00n) return decodeArmService;
  if (service === 0x04n) return decodeSecureService;
  if (service === 0x05n) return decodeHypService;
  if (service === 0x30n || service === 0x31n) return decodeTappService;
  return decodeCommonService;
}

function decodeFastCall(fid: bigint): FieldInfo[] {
  const convention = FieldInfo.getBit(fid, 'Call Convention', undefined, 30).describeBit(describeConvention);
  const serviceCall = FieldInfo.get(fid, 'Service Call', undefined, 24, 30).describe(describeService);
  const mbz = FieldInfo.get(fid, 'MBZ', 'Some legacy Armv7 set this to 1', 17, 24);
  const sve = FieldInfo.getBit(
    fid,
    'SVE live state',
    'No live state[1] From SMCCCv1.3, before SMCCCv1.3 MBZ',
    16,
  );
  const functionNumber = serviceDecoder(serviceCall.value)(fid, convention.value);

  return [convention, serviceCall, mbz, sve, functionNumber];
}

function decodeYieldingCall(fid: bigint): FieldInfo[] {
  return [FieldInfo.get(fid, 'Service Type', undefined, 0, 31).describe(describeYieldService)];
}

/**
 * Decodes an SMC Calling Convention function identifier (ARM DEN 0028E v1.4).
 * Never fails on a 64-bit value: bits above 31 are not part of the layout.
 */
export function decodeSmccc(value: bigint | number): FieldInfo[] {
  const fid = toRegister(value);
  const callType = FieldInfo.getBit(fid, 'Call Type', undefined, 31).describeBit(describeCallType);
  const rest = callType.asBit() ? decodeFastCall(fid) : decodeYieldingCall(fid);
  return [callType, ...rest];
}
