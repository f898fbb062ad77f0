import type { FieldInfo } from '../../src/FieldInfo';
import { decodeSmccc, describeService, describeYieldService } from '../../src/smccc/decodeSmccc';

function summary(fields: readonly FieldInfo[]): Array<[string, number, bigint, string | undefined]> {
  return fields.map(f => [f.name, f.start, f.value, f.description]);
}

/** Description of the Function Number field of a fast call. */
function functionDescription(fid: bigint): string | undefined {
  const fields = decodeSmccc(fid);
  expect(fields).toHaveLength(6);
  return fields[5].description;
}

describe('decodeSmccc', () => {
  test('decodes a fast call', () => {
    expect(summary(decodeSmccc(0x84000000n))).toEqual([
      ['Call Type', 31, 1n, 'Fast Call'],
      ['Call Convention', 30, 0n, 'SMC32/HVC32'],
      ['Service Call', 24, 4n, 'Standard Secure Service Call'],
      ['MBZ', 17, 0n, undefined],
      ['SVE live state', 16, 0n, undefined],
      ['Function Number', 0, 0n, 'PSCI Call (Power Secure Control Interface)'],
    ]);
  });

  test('decodes a yielding call', () => {
    expect(summary(decodeSmccc(0x02000000n))).toEqual([
      ['Call Type', 31, 0n, 'Yielding Call'],
      ['Service Type', 0, 0x02000000n, 'Trusted OS Yielding Calls'],
    ]);
  });

  test('reports MBZ and SVE live state without rejecting them', () => {
    const fields = decodeSmccc(0x80ff0000n);
    expect(fields[3].value).toBe(0x7fn);
    expect(fields[3].longName).toBe('Some legacy Armv7 set this to 1');
    expect(fields[4].value).toBe(1n);
  });

  test('ignores bits above 31', () => {
    expect(decodeSmccc(0xffffffff_84000000n)).toEqual(decodeSmccc(0x84000000n));
  });

  test('accepts a number', () => {
    expect(decodeSmccc(0xc4000071)[1].description).toBe('SMC64/HVC64');
  });
});

describe('function numbers', () => {
  test.each([
    // Arm architecture calls
    [0x80000000n, 'SMCCC_VERSION'],
    [0x80000001n, 'SMCCC_ARCH_FEATURES'],
    [0x80008000n, 'SMCCC_ARCH_WORKAROUND_1'],
    [0x80007fffn, 'SMCCC_ARCH_WORKAROUND_2'],
    [0x8000ff01n, 'Call UUID Query, deprecated from SMCCCv1.2'],
    [0x8000ff02n, 'Reserved for future expansion'],
    [0xc000ff00n, 'Reserved for future expansion'],
    // Standard secure calls
    [0x84000020n, 'SDEI Call (Software Delegated Exception Interface)'],
    [0x84000050n, 'TRNG Call'],
    [0x84000063n, 'FFA_VERSION_32'],
    [0x84000078n, 'FFA_MEM_OP_PAUSE'],
    [0x840000a0n, 'Unknown FF-A Call'],
    [0x84000100n, 'Errata Call'],
    [0x84000150n, 'CCA Call'],
    [0x8400ff01n, 'Call UUID Query'],
    [0xc4000071n, 'FFA_MEM_DONATE_64'],
    [0xc4000063n, 'Unknown FF-A Call'],
    // Standard hypervisor calls
    [0xc5000020n, 'PV Time 64-bit calls'],
    [0x8500ff00n, 'Call Count Query, deprecated from SMCCCv1.2'],
    // Trusted applications
    [0xb0000001n, 'Trusted Application defined call'],
    [0xb000ff03n, 'Revision Query'],
    [0xf100ff03n, 'Reserved for future expansion'],
    // Services without a table of their own
    [0x8200ff00n, 'Call Count Query, deprecated from SMCCCv1.2'],
    [0xb2ff0000n, undefined],
    [0xc600ff01n, 'Reserved for future expansion'],
  ])('%p', (fid, description) => {
    expect(functionDescription(fid)).toBe(description);
  });

  test.each([
    0x80000010n, // unassigned Arm call
    0xc0000000n, // no 64-bit Arm calls below the reserved range
    0x84000120n, // gap between the Errata and CCA ranges
    0x85000020n, // PV time has no 32-bit calls
    0x82000000n, // SiP calls are vendor defined
  ])('%p has no description', fid => {
    const fields = decodeSmccc(fid);
    expect(fields[5].name).toBe('Function Number');
    expect('description' in fields[5]).toBe(false);
  });
});

describe('describeService', () => {
  test.each([
    [0x00n, 'Arm Architecture Call'],
    [0x01n, 'CPU Service Call'],
    [0x02n, 'SiP Service Call'],
    [0x03n, 'OEM Service Call'],
    [0x06n, 'Vendor Specific Hypervisor Service Call'],
    [0x07n, 'Reserved for future use'],
    [0x2fn, 'Reserved for future use'],
    [0x31n, 'Trusted Application Call'],
    [0x32n, 'Trusted OS Call'],
    [0x3fn, 'Trusted OS Call'],
  ])('%p is %s', (service, description) => {
    expect(describeService(service)).toBe(description);
  });
});

describe('describeYieldService', () => {
  test.each([
    [0x0n, 'Reserved for existing APIs (in use by the existing Armv7 devices)'],
    [0x0100ffffn, 'Reserved for existing APIs (in use by the existing Armv7 devices)'],
    [0x01010000n, 'Unknown'],
    [0x1fffffffn, 'Trusted OS Yielding Calls'],
    [0x20000000n, 'Reserved for future expansion of Trusted OS Yielding Calls'],
    [0x7fffffffn, 'Reserved for future expansion of Trusted OS Yielding Calls'],
  ])('%p is %s', (service, description) => {
    expect(describeYieldService(service)).toBe(description);
  });
});
